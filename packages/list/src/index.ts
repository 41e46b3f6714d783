export {List, listLength, destroyList} from "./list.js";
export type {MembershipSet} from "./list.js";
export {ListIterator} from "./iterator.js";
export {ListError, ListErrorCode} from "./errors.js";
export type {ListErrorType} from "./errors.js";
export {defaultListOptions, getDefaultListLogger} from "./options.js";
export type {ListOptions, RandomIntFn} from "./options.js";
