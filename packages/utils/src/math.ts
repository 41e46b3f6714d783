/**
 * Integer quotient, rounded towards negative infinity
 */
export function intDiv(dividend: number, divisor: number): number {
  return Math.floor(dividend / divisor);
}

/**
 * Uniform random integer in `[min, max)` drawn from `Math.random`
 */
export function randBetween(min: number, max: number): number {
  return min + Math.floor(Math.random() * (max - min));
}
