export * from "./types.js";
export {naturalCompare} from "./naturalCompare.js";
export {SortedSet} from "./sortedSet.js";
