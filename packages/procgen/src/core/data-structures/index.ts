/**
 * Data Structures - containers used by the generation passes
 */

export { type HeapEntry, MinHeap } from "./min-heap";
