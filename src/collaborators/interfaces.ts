/**
 * Collaborators the ledger consumes but does not own. Each is injected into
 * the engines at construction so tests can substitute doubles.
 */

/**
 * Fungible balance ledger holding the underlying asset.
 * Methods return false on failure; the engines treat that as a hard error.
 */
export interface IFungibleAsset {
  /** Move `amount` from `from` to `to`, spending `spender`'s allowance */
  transferFrom(spender: string, from: string, to: string, amount: bigint): boolean;
  /** Move `amount` out of `from`'s own balance */
  transfer(from: string, to: string, amount: bigint): boolean;
  balanceOf(holder: string): bigint;
}

/**
 * Node infrastructure view of a position.
 */
export interface INodeProperties {
  isAttached(positionId: number): boolean;
  /** Quality score in 0..10 at `timestamp` */
  nodeQualityOf(positionId: number, timestamp: number): number;
}

/**
 * Read-side of the reward engine used by the escrow to block mutation while
 * rewards are outstanding.
 */
export interface IRewardsOracle {
  unclaimedRewards(positionId: number): bigint;
}

/**
 * Monotonic time source. Both values must be non-decreasing across calls.
 */
export interface IClock {
  /** Unix timestamp in seconds */
  now(): number;
  blockNumber(): number;
}
