export * from "./canonicalize/index.js";
export * from "./diagnostics/index.js";
export * from "./interfaces/codec.js";
export { stronglyConnectedComponents, type SccGroup } from "./graph/scc.js";
