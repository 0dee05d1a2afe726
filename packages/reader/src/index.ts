export type { ReadResult } from "./corpus.js";
export { discoverSources, modulePathFor, readCorpus, readSource } from "./corpus.js";
