import debug from "debug";

// Enable with DEBUG=ngram:*
export const log = {
  markov: debug("ngram:markov"),
  sampler: debug("ngram:sampler")
};
