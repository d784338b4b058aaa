/**
 * feegate math public surface. Pure, side-effect free helpers.
 */
export * from './uint256'
export * from './fee'
