import { IFungibleAsset } from './interfaces';

/** Plain copy of the token's books, for persistence */
export interface TokenSnapshot {
  totalSupply: bigint;
  balances: Array<[string, bigint]>;
  /** [owner, spender, amount] */
  allowances: Array<[string, string, bigint]>;
}

/**
 * In-process fungible token with balances and allowances.
 * Used by the HTTP service and by tests in place of an external ledger.
 */
export class InMemoryToken implements IFungibleAsset {
  private balances = new Map<string, bigint>();
  private allowances = new Map<string, Map<string, bigint>>();
  private supply = 0n;

  constructor(
    public readonly name: string = 'Lock Token',
    public readonly symbol: string = 'LOCK',
    public readonly decimals: number = 18
  ) {}

  balanceOf(holder: string): bigint {
    return this.balances.get(holder) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply;
  }

  allowance(owner: string, spender: string): bigint {
    return this.allowances.get(owner)?.get(spender) ?? 0n;
  }

  mint(to: string, amount: bigint): void {
    if (amount < 0n) {
      throw new Error(`Cannot mint a negative amount: ${amount}`);
    }
    this.balances.set(to, this.balanceOf(to) + amount);
    this.supply += amount;
  }

  approve(owner: string, spender: string, amount: bigint): void {
    if (amount < 0n) {
      throw new Error(`Cannot approve a negative amount: ${amount}`);
    }
    const owned = this.allowances.get(owner) ?? new Map<string, bigint>();
    owned.set(spender, amount);
    this.allowances.set(owner, owned);
  }

  transfer(from: string, to: string, amount: bigint): boolean {
    if (amount < 0n || this.balanceOf(from) < amount) {
      return false;
    }
    this.move(from, to, amount);
    return true;
  }

  transferFrom(spender: string, from: string, to: string, amount: bigint): boolean {
    const allowed = this.allowance(from, spender);
    if (amount < 0n || allowed < amount || this.balanceOf(from) < amount) {
      return false;
    }
    this.approve(from, spender, allowed - amount);
    this.move(from, to, amount);
    return true;
  }

  snapshot(): TokenSnapshot {
    const allowances: Array<[string, string, bigint]> = [];
    for (const [owner, spenders] of this.allowances) {
      for (const [spender, amount] of spenders) {
        allowances.push([owner, spender, amount]);
      }
    }
    return {
      totalSupply: this.supply,
      balances: Array.from(this.balances.entries()),
      allowances,
    };
  }

  restore(snapshot: TokenSnapshot): void {
    this.supply = snapshot.totalSupply;
    this.balances = new Map(snapshot.balances);
    this.allowances = new Map();
    for (const [owner, spender, amount] of snapshot.allowances) {
      this.approve(owner, spender, amount);
    }
  }

  private move(from: string, to: string, amount: bigint): void {
    this.balances.set(from, this.balanceOf(from) - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
  }
}
