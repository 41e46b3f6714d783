/**
 * Three-way comparator: negative if `a` sorts before `b`, zero if equal, positive if after.
 * Must be a strict weak ordering.
 */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * Drop policy invoked once per element when its owning container is destroyed
 */
export type Destructor<T> = (element: T) => void;
