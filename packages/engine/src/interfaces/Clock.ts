/** Wall clock in whole unix seconds. */
export interface Clock {
  now(): number
}
