/**
 * @seqflow/collections — hash-based collections driven by explicit
 * Eq and Hash instances.
 */

export { HashSet } from "./hash-set.js";
