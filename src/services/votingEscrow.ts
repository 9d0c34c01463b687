/**
 * Voting escrow: locks the underlying asset into non-fungible positions whose
 * voting power decays linearly to zero at expiry.
 *
 * Every public mutation is atomic: the state container is snapshotted on
 * entry and restored if anything throws, so a failed call leaves no partial
 * checkpoint behind. Entry points that move custody of the asset are also
 * guarded against re-entry from the asset ledger.
 */

import {
  DepositType,
  LockedBalance,
  MAXTIME,
  Point,
  WEEK,
  emptyLockedBalance,
  floorToWeek,
} from '../types';
import { TOKEN_DECIMALS, toInt128, toUint256, toUint48 } from '../fixedPoint';
import { ErrorCodes, LedgerError, invariant } from '../errors';
import { IClock, IFungibleAsset, INodeProperties, IRewardsOracle } from '../collaborators';
import { buildDelegationMessage, deriveAddress, verify } from '../crypto';
import {
  EscrowSettings,
  EscrowState,
  IVotingPowerSource,
  LedgerEvent,
  LedgerEventType,
  LiquidationResult,
  createEmptyEscrowState,
} from './serviceTypes';
import { StateGuard, requireGovernor } from './stateGuard';
import { checkpoint, userPointAt, votingPowerAt } from './positionLedger';
import { copyPoint, slopeChangeAt, totalPowerAt } from './pointHistory';
import {
  cumulativeVotes,
  currentDelegateSet,
  delegateOf,
  delegateSetAt,
  moveDelegatedPositions,
  setDelegate,
} from './delegationService';

export interface VotingEscrowOptions {
  token: IFungibleAsset;
  clock: IClock;
  settings: EscrowSettings;
  nodeProperties?: INodeProperties;
  rewards?: IRewardsOracle;
  /** Previously persisted state to resume from */
  state?: EscrowState;
}

export interface CreateLockParams {
  caller: string;
  amount: bigint;
  /** Seconds from now; the unlock time is rounded down to a week boundary */
  duration: number;
  /** Owner of the new position, defaults to `caller` */
  recipient?: string;
  /** false creates a non-voting position */
  voting?: boolean;
}

export interface DelegateBySigParams {
  /** Signer's hex SPKI Ed25519 public key; the signer address derives from it */
  publicKey: string;
  delegatee: string;
  nonce: number;
  expiry: number;
  signature: string;
}

export interface GovernanceChanges {
  treasury?: string;
  liquidationsEnabled?: boolean;
  penalty?: { numerator: bigint; denominator: bigint };
  minimumLock?: bigint;
}

export class VotingEscrow implements IVotingPowerSource {
  readonly name = 'Vote-Escrowed Lock';
  readonly symbol = 'veLOCK';
  readonly version = '1.0.0';
  readonly decimals = TOKEN_DECIMALS;

  private state: EscrowState;
  private readonly guard = new StateGuard<EscrowState>(
    () => this.state,
    state => {
      this.state = state;
    }
  );
  private readonly token: IFungibleAsset;
  private readonly clock: IClock;
  private nodeProperties?: INodeProperties;
  private rewards?: IRewardsOracle;

  constructor(options: VotingEscrowOptions) {
    this.token = options.token;
    this.clock = options.clock;
    this.nodeProperties = options.nodeProperties;
    this.rewards = options.rewards;
    this.state =
      options.state ??
      createEmptyEscrowState(options.settings, {
        ts: options.clock.now(),
        blk: options.clock.blockNumber(),
      });
  }

  // ---------------------------------------------------------------------------
  // Lock lifecycle
  // ---------------------------------------------------------------------------

  createLock(params: CreateLockParams): number {
    return this.guard.nonReentrant(() =>
      this.guard.mutate(() => {
        const { caller, amount, duration } = params;
        const recipient = params.recipient ?? caller;
        const now = this.clock.now();

        if (!recipient) {
          throw new LedgerError(ErrorCodes.ZERO_ADDRESS, 'Recipient is required');
        }
        if (amount <= 0n) {
          throw new LedgerError(ErrorCodes.ZERO_AMOUNT, 'Lock amount must be positive');
        }
        if (amount < this.state.settings.minimumLock) {
          throw new LedgerError(
            ErrorCodes.AMOUNT_TOO_SMALL,
            `Lock amount ${amount} is below the minimum ${this.state.settings.minimumLock}`,
            { amount: amount.toString(), minimum: this.state.settings.minimumLock.toString() }
          );
        }

        const unlockTime = this.unlockTimeFor(now, duration);
        if (unlockTime <= now) {
          throw new LedgerError(
            ErrorCodes.LOCK_DURATION_NOT_IN_FUTURE,
            `Unlock time ${unlockTime} is not in the future`,
            { unlockTime, now }
          );
        }
        this.requireWithinMaxTime(unlockTime, now);

        return this.createLockInternal({
          payer: caller,
          amount,
          unlockTime,
          recipient,
          voting: params.voting ?? true,
          depositType: DepositType.CREATE_LOCK,
        });
      })
    );
  }

  /** Top up an unexpired lock. Anyone may pay. */
  depositFor(caller: string, positionId: number, amount: bigint): void {
    this.guard.nonReentrant(() =>
      this.guard.mutate(() => {
        const now = this.clock.now();
        this.requireOwned(positionId);
        if (amount <= 0n) {
          throw new LedgerError(ErrorCodes.ZERO_AMOUNT, 'Deposit amount must be positive');
        }
        const oldLocked = this.requireActiveLock(positionId, now);
        this.depositInternal(positionId, amount, 0, oldLocked, DepositType.DEPOSIT_FOR, caller);
      })
    );
  }

  increaseAmount(caller: string, positionId: number, amount: bigint): void {
    this.guard.nonReentrant(() =>
      this.guard.mutate(() => {
        const now = this.clock.now();
        this.requireApprovedOrOwner(caller, positionId);
        if (amount <= 0n) {
          throw new LedgerError(ErrorCodes.ZERO_AMOUNT, 'Deposit amount must be positive');
        }
        const oldLocked = this.requireActiveLock(positionId, now);
        this.requireNoUnclaimedRewards(positionId);
        this.depositInternal(
          positionId,
          amount,
          0,
          oldLocked,
          DepositType.INCREASE_LOCK_AMOUNT,
          caller
        );
      })
    );
  }

  increaseUnlockTime(caller: string, positionId: number, duration: number): void {
    this.guard.mutate(() => {
      const now = this.clock.now();
      this.requireApprovedOrOwner(caller, positionId);
      const oldLocked = this.requireActiveLock(positionId, now);
      this.requireNoUnclaimedRewards(positionId);

      const unlockTime = this.unlockTimeFor(now, duration);
      if (unlockTime <= oldLocked.end) {
        throw new LedgerError(
          ErrorCodes.LOCK_DURATION_NOT_IN_FUTURE,
          `New unlock time ${unlockTime} must be after the current one ${oldLocked.end}`,
          { unlockTime, currentEnd: oldLocked.end }
        );
      }
      this.requireWithinMaxTime(unlockTime, now);

      this.depositInternal(
        positionId,
        0n,
        unlockTime,
        oldLocked,
        DepositType.INCREASE_UNLOCK_TIME,
        caller
      );
    });
  }

  /**
   * Fold `from` into `to`. The combined end is the value-weighted average end,
   * floored to a week and pushed one week out.
   */
  merge(caller: string, from: number, to: number): void {
    this.guard.mutate(() => {
      const now = this.clock.now();
      if (from === to) {
        throw new LedgerError(ErrorCodes.SAME_POSITION, `Cannot merge position ${from} into itself`);
      }
      this.requireApprovedOrOwner(caller, from);
      this.requireApprovedOrOwner(caller, to);
      if (this.state.owners.get(from) !== this.state.owners.get(to)) {
        throw new LedgerError(
          ErrorCodes.DIFFERENT_OWNERS,
          `Positions ${from} and ${to} have different owners`
        );
      }
      if (this.isNonVoting(from) !== this.isNonVoting(to)) {
        throw new LedgerError(
          ErrorCodes.DIFFERENT_VOTING_FLAGS,
          `Positions ${from} and ${to} differ in voting flag`
        );
      }
      for (const id of [from, to]) {
        this.requireNotAttached(id);
        this.requireNoUnclaimedRewards(id);
        this.requireNoStructuralChange(id, now);
      }
      const oldFrom = this.requireActiveLock(from, now);
      const oldTo = this.requireActiveLock(to, now);

      const combined = toInt128(oldFrom.amount + oldTo.amount);
      const weightedEnd = Number(
        (oldFrom.amount * BigInt(oldFrom.end) + oldTo.amount * BigInt(oldTo.end)) / combined
      );
      const end = Math.min(floorToWeek(weightedEnd) + WEEK, floorToWeek(now + MAXTIME));

      this.state.locked.set(from, emptyLockedBalance());
      this.checkpointPosition(from, oldFrom, emptyLockedBalance(), now);
      const owner = this.requireOwned(from);
      moveDelegatedPositions(this.state, delegateOf(this.state, owner), undefined, [from], now);
      this.burn(from, now);

      const newTo: LockedBalance = { amount: combined, end };
      this.state.locked.set(to, newTo);
      this.checkpointPosition(to, oldTo, newTo, now);
      this.state.structuralChange.set(to, now);

      invariant(
        newTo.amount === oldFrom.amount + oldTo.amount,
        `merged amount ${newTo.amount} != ${oldFrom.amount} + ${oldTo.amount}`
      );

      this.emit('MERGE', now, {
        accountId: caller,
        positionId: to,
        details: {
          from,
          to,
          amountFrom: oldFrom.amount.toString(),
          amountTo: oldTo.amount.toString(),
          amountFinal: newTo.amount.toString(),
          locktime: end,
        },
      });
      this.emit('DEPOSIT', now, {
        accountId: caller,
        positionId: to,
        details: {
          value: oldFrom.amount.toString(),
          locktime: end,
          depositType: DepositType.MERGE,
        },
      });
    });
  }

  /**
   * Carve `extractAmount` out of a lock into a new sibling position with the
   * same end time, owner and voting flag. Returns the new position ID.
   */
  split(caller: string, positionId: number, extractAmount: bigint): number {
    return this.guard.mutate(() => {
      const now = this.clock.now();
      const owner = this.requireApprovedOrOwner(caller, positionId);
      this.requireNotAttached(positionId);
      this.requireNoUnclaimedRewards(positionId);
      this.requireNoStructuralChange(positionId, now);
      const oldLocked = this.requireActiveLock(positionId, now);

      if (extractAmount <= 0n) {
        throw new LedgerError(ErrorCodes.ZERO_AMOUNT, 'Split amount must be positive');
      }
      if (extractAmount >= oldLocked.amount) {
        throw new LedgerError(
          ErrorCodes.AMOUNT_TOO_BIG,
          `Split amount ${extractAmount} must be below the locked amount ${oldLocked.amount}`,
          { extractAmount: extractAmount.toString(), locked: oldLocked.amount.toString() }
        );
      }

      const remaining: LockedBalance = { amount: oldLocked.amount - extractAmount, end: oldLocked.end };
      this.state.locked.set(positionId, remaining);
      this.state.supply -= extractAmount;
      this.checkpointPosition(positionId, oldLocked, remaining, now);
      this.state.structuralChange.set(positionId, now);

      let duration = oldLocked.end - now;
      if (floorToWeek(now + duration) !== oldLocked.end) {
        duration += WEEK;
      }
      const unlockTime = this.unlockTimeFor(now, duration);
      invariant(unlockTime === oldLocked.end, `split end ${unlockTime} != ${oldLocked.end}`);

      const newId = this.createLockInternal({
        payer: owner,
        amount: extractAmount,
        unlockTime,
        recipient: owner,
        voting: !this.isNonVoting(positionId),
        depositType: DepositType.SPLIT,
      });

      const extracted = this.locked(newId).amount;
      invariant(
        remaining.amount + extracted === oldLocked.amount,
        `split amounts ${remaining.amount} + ${extracted} != ${oldLocked.amount}`
      );

      this.emit('SPLIT', now, {
        accountId: caller,
        positionId,
        details: {
          from: positionId,
          newPositionId: newId,
          amountRemaining: remaining.amount.toString(),
          amountExtracted: extracted.toString(),
          locktime: oldLocked.end,
        },
      });
      return newId;
    });
  }

  /** Release an expired lock to its owner and destroy the position. */
  withdraw(caller: string, positionId: number): bigint {
    return this.guard.nonReentrant(() =>
      this.guard.mutate(() => {
        const now = this.clock.now();
        this.requireApprovedOrOwner(caller, positionId);
        this.requireNotAttached(positionId);
        this.requireNoUnclaimedRewards(positionId);
        const oldLocked = this.requireExistingLock(positionId);
        if (now < oldLocked.end) {
          throw new LedgerError(
            ErrorCodes.LOCK_NOT_EXPIRED,
            `Position ${positionId} is locked until ${oldLocked.end}`,
            { end: oldLocked.end, now }
          );
        }
        return this.release(caller, positionId, oldLocked, now).returned;
      })
    );
  }

  /**
   * Exit a lock early. The penalty is a fraction of current voting power and
   * goes to the treasury; the rest returns to the owner. An expired lock
   * exits like a withdrawal with no penalty.
   */
  liquidate(caller: string, positionId: number): LiquidationResult {
    return this.guard.nonReentrant(() =>
      this.guard.mutate(() => {
        const now = this.clock.now();
        const settings = this.state.settings;
        if (!settings.liquidationsEnabled) {
          throw new LedgerError(ErrorCodes.LIQUIDATIONS_DISABLED, 'Liquidations are disabled');
        }
        this.requireApprovedOrOwner(caller, positionId);
        this.requireNotAttached(positionId);
        this.requireNoUnclaimedRewards(positionId);
        const oldLocked = this.requireExistingLock(positionId);

        if (now >= oldLocked.end) {
          return this.release(caller, positionId, oldLocked, now);
        }

        const power = votingPowerAt(this.state, positionId, now);
        const penalty =
          (power * settings.liquidationPenaltyNumerator) / settings.liquidationPenaltyDenominator;
        if (penalty === 0n) {
          throw new LedgerError(
            ErrorCodes.ZERO_PENALTY,
            `Position ${positionId} is too small to liquidate`,
            { votingPower: power.toString() }
          );
        }
        invariant(penalty <= oldLocked.amount, `penalty ${penalty} exceeds locked ${oldLocked.amount}`);

        return this.release(caller, positionId, oldLocked, now, penalty);
      })
    );
  }

  /** Global heartbeat: replay the aggregate to now without touching a position. */
  checkpoint(): void {
    this.guard.mutate(() => {
      checkpoint(this.state, {
        oldLocked: emptyLockedBalance(),
        newLocked: emptyLockedBalance(),
        voting: true,
        now: this.clock.now(),
        blockNumber: this.clock.blockNumber(),
      });
    });
  }

  // ---------------------------------------------------------------------------
  // Ownership
  // ---------------------------------------------------------------------------

  ownerOf(positionId: number): string | undefined {
    return this.state.owners.get(positionId);
  }

  balanceOf(owner: string): number {
    return this.state.ownerTokens.get(owner)?.length ?? 0;
  }

  tokensOfOwner(owner: string): number[] {
    return [...(this.state.ownerTokens.get(owner) ?? [])];
  }

  getApproved(positionId: number): string | undefined {
    return this.state.approvals.get(positionId);
  }

  isApprovedForAll(owner: string, operator: string): boolean {
    return this.state.operatorApprovals.get(owner)?.includes(operator) ?? false;
  }

  isApprovedOrOwner(spender: string, positionId: number): boolean {
    const owner = this.state.owners.get(positionId);
    if (owner === undefined) return false;
    return (
      owner === spender ||
      this.state.approvals.get(positionId) === spender ||
      this.isApprovedForAll(owner, spender)
    );
  }

  approve(caller: string, approved: string, positionId: number): void {
    this.guard.mutate(() => {
      const owner = this.requireOwned(positionId);
      if (owner !== caller && !this.isApprovedForAll(owner, caller)) {
        throw new LedgerError(ErrorCodes.NOT_AUTHORIZED, `${caller} cannot approve position ${positionId}`);
      }
      if (approved) {
        this.state.approvals.set(positionId, approved);
      } else {
        this.state.approvals.delete(positionId);
      }
      this.emit('APPROVAL', this.clock.now(), {
        accountId: owner,
        positionId,
        details: { approved },
      });
    });
  }

  setApprovalForAll(caller: string, operator: string, approved: boolean): void {
    this.guard.mutate(() => {
      if (caller === operator) {
        throw new LedgerError(ErrorCodes.NOT_AUTHORIZED, 'Cannot approve yourself as operator');
      }
      const operators = new Set(this.state.operatorApprovals.get(caller) ?? []);
      if (approved) {
        operators.add(operator);
      } else {
        operators.delete(operator);
      }
      this.state.operatorApprovals.set(caller, [...operators]);
      this.emit('APPROVAL_FOR_ALL', this.clock.now(), {
        accountId: caller,
        details: { operator, approved },
      });
    });
  }

  transferFrom(caller: string, from: string, to: string, positionId: number): void {
    this.guard.mutate(() => {
      const now = this.clock.now();
      const owner = this.requireApprovedOrOwner(caller, positionId);
      if (owner !== from) {
        throw new LedgerError(ErrorCodes.NOT_OWNER, `${from} does not own position ${positionId}`);
      }
      if (!to) {
        throw new LedgerError(ErrorCodes.ZERO_ADDRESS, 'Transfer recipient is required');
      }
      this.requireNoStructuralChange(positionId, now);

      this.state.approvals.delete(positionId);
      this.removeFromOwner(from, positionId);
      this.addToOwner(to, positionId);
      this.state.owners.set(positionId, to);
      this.state.structuralChange.set(positionId, now);

      const toDelegate = delegateOf(this.state, to);
      this.state.delegates.set(to, toDelegate);
      moveDelegatedPositions(this.state, delegateOf(this.state, from), toDelegate, [positionId], now);

      this.emit('TRANSFER', now, { accountId: from, positionId, details: { from, to } });
    });
  }

  // ---------------------------------------------------------------------------
  // Delegation
  // ---------------------------------------------------------------------------

  delegates(account: string): string {
    return delegateOf(this.state, account);
  }

  /** Route `caller`'s votes to `delegatee` (empty means self). */
  delegate(caller: string, delegatee: string): void {
    this.guard.mutate(() => this.delegateInternal(caller, delegatee || caller));
  }

  delegateBySig(params: DelegateBySigParams): void {
    this.guard.mutate(() => {
      const now = this.clock.now();
      if (now > params.expiry) {
        throw new LedgerError(
          ErrorCodes.SIGNATURE_EXPIRED,
          `Signature expired at ${params.expiry}`,
          { expiry: params.expiry, now }
        );
      }
      const message = buildDelegationMessage(params.delegatee, params.nonce, params.expiry);
      if (!verify(message, params.signature, params.publicKey)) {
        throw new LedgerError(ErrorCodes.INVALID_SIGNATURE, 'Invalid delegation signature');
      }
      const signer = deriveAddress(params.publicKey);
      const current = this.state.nonces.get(signer) ?? 0;
      if (params.nonce !== current) {
        throw new LedgerError(
          ErrorCodes.INVALID_NONCE,
          `Invalid nonce ${params.nonce} for ${signer}, expected ${current}`,
          { nonce: params.nonce, expected: current }
        );
      }
      this.state.nonces.set(signer, current + 1);
      this.delegateInternal(signer, params.delegatee || signer);
    });
  }

  nonces(account: string): number {
    return this.state.nonces.get(account) ?? 0;
  }

  currentDelegateSet(account: string): number[] {
    return currentDelegateSet(this.state, account);
  }

  delegateSetAt(account: string, timestamp: number): number[] {
    return delegateSetAt(this.state, account, timestamp);
  }

  getVotes(account: string): bigint {
    return cumulativeVotes(this.state, account, this.clock.now());
  }

  getPastVotes(account: string, timestamp: number): bigint {
    return cumulativeVotes(this.state, account, timestamp);
  }

  getPastTotalSupply(timestamp: number): bigint {
    return totalPowerAt(this.state, timestamp);
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  votingPowerOf(positionId: number, timestamp: number = this.clock.now()): bigint {
    return votingPowerAt(this.state, positionId, timestamp);
  }

  totalPowerAt(timestamp: number = this.clock.now()): bigint {
    return totalPowerAt(this.state, timestamp);
  }

  locked(positionId: number): LockedBalance {
    const locked = this.state.locked.get(positionId);
    return locked ? { amount: locked.amount, end: locked.end } : emptyLockedBalance();
  }

  /** Total amount under lock */
  supply(): bigint {
    return this.state.supply;
  }

  get epoch(): number {
    return this.state.epoch;
  }

  pointHistory(epoch: number): Point | undefined {
    const point = this.state.pointHistory[epoch];
    return point ? copyPoint(point) : undefined;
  }

  userPointEpoch(positionId: number): number {
    return this.state.userPointEpoch.get(positionId) ?? 0;
  }

  userPointHistory(positionId: number, userEpoch: number): Point | undefined {
    return userPointAt(this.state, positionId, userEpoch);
  }

  slopeChange(timestamp: number): bigint {
    return slopeChangeAt(this.state, timestamp);
  }

  isNonVoting(positionId: number): boolean {
    return this.state.nonVoting.get(positionId) ?? false;
  }

  createdAt(positionId: number): number | undefined {
    return this.state.createdAt.get(positionId);
  }

  tokenURI(positionId: number): string {
    this.requireOwned(positionId);
    return `${this.state.settings.baseURI}${positionId}`;
  }

  get settings(): EscrowSettings {
    return { ...this.state.settings };
  }

  events(): LedgerEvent[] {
    return [...this.state.events];
  }

  /** Deep copy of the full state, for persistence */
  exportState(): EscrowState {
    return structuredClone(this.state);
  }

  // ---------------------------------------------------------------------------
  // Governance
  // ---------------------------------------------------------------------------

  setGovernor(caller: string, governor: string): void {
    this.updateSettings(caller, { governor });
  }

  setTreasury(caller: string, treasury: string): void {
    this.updateSettings(caller, { treasury });
  }

  setLiquidationsEnabled(caller: string, enabled: boolean): void {
    this.updateSettings(caller, { liquidationsEnabled: enabled });
  }

  setLiquidationPenalty(caller: string, numerator: bigint, denominator: bigint): void {
    this.updateGovernanceSettings(caller, { penalty: { numerator, denominator } });
  }

  setMinimumLock(caller: string, minimumLock: bigint): void {
    this.updateGovernanceSettings(caller, { minimumLock });
  }

  /** Apply several governance changes as one; an invalid field leaves every setting as it was. */
  updateGovernanceSettings(caller: string, changes: GovernanceChanges): void {
    const settings: Partial<EscrowSettings> = {};
    if (changes.treasury !== undefined) settings.treasury = changes.treasury;
    if (changes.liquidationsEnabled !== undefined) {
      settings.liquidationsEnabled = changes.liquidationsEnabled;
    }
    if (changes.penalty !== undefined) {
      const { numerator, denominator } = changes.penalty;
      if (denominator <= 0n || numerator < 0n || numerator > denominator) {
        throw new LedgerError(
          ErrorCodes.ARITHMETIC_OVERFLOW,
          `Invalid liquidation penalty ${numerator}/${denominator}`
        );
      }
      settings.liquidationPenaltyNumerator = numerator;
      settings.liquidationPenaltyDenominator = denominator;
    }
    if (changes.minimumLock !== undefined) settings.minimumLock = toUint256(changes.minimumLock);
    if (Object.keys(settings).length === 0) {
      requireGovernor(this.state, caller);
      return;
    }
    this.updateSettings(caller, settings);
  }

  setNodeProperties(caller: string, nodeProperties: INodeProperties): void {
    requireGovernor(this.state, caller);
    this.nodeProperties = nodeProperties;
  }

  setRewards(caller: string, rewards: IRewardsOracle): void {
    requireGovernor(this.state, caller);
    this.rewards = rewards;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private createLockInternal(params: {
    payer: string;
    amount: bigint;
    unlockTime: number;
    recipient: string;
    voting: boolean;
    depositType: DepositType;
  }): number {
    const now = this.clock.now();
    const positionId = ++this.state.tokenId;
    this.state.nonVoting.set(positionId, !params.voting);
    this.state.createdAt.set(positionId, now);
    this.mint(params.recipient, positionId, now);

    this.depositInternal(
      positionId,
      params.amount,
      params.unlockTime,
      emptyLockedBalance(),
      params.depositType,
      params.payer
    );

    const delegatee = delegateOf(this.state, params.recipient);
    this.state.delegates.set(params.recipient, delegatee);
    moveDelegatedPositions(this.state, undefined, delegatee, [positionId], now);
    return positionId;
  }

  private depositInternal(
    positionId: number,
    value: bigint,
    unlockTime: number,
    oldLocked: LockedBalance,
    depositType: DepositType,
    payer: string
  ): void {
    const now = this.clock.now();
    const supplyBefore = this.state.supply;
    this.state.supply = supplyBefore + value;

    const newLocked: LockedBalance = {
      amount: toInt128(oldLocked.amount + value),
      end: unlockTime !== 0 ? toUint48(unlockTime) : oldLocked.end,
    };
    this.state.locked.set(positionId, newLocked);
    this.checkpointPosition(positionId, oldLocked, newLocked, now);

    if (value !== 0n && depositType !== DepositType.MERGE && depositType !== DepositType.SPLIT) {
      this.pullFrom(payer, value);
    }

    this.emit('DEPOSIT', now, {
      accountId: payer,
      positionId,
      details: { value: value.toString(), locktime: newLocked.end, depositType },
    });
    this.emit('SUPPLY', now, {
      details: { supplyBefore: supplyBefore.toString(), supply: this.state.supply.toString() },
    });
  }

  /** Zero the lock, destroy the position and pay out. */
  private release(
    caller: string,
    positionId: number,
    oldLocked: LockedBalance,
    now: number,
    penalty: bigint = 0n
  ): LiquidationResult {
    const owner = this.requireOwned(positionId);
    const value = oldLocked.amount;
    const supplyBefore = this.state.supply;

    this.state.locked.set(positionId, emptyLockedBalance());
    this.state.supply = supplyBefore - value;
    this.checkpointPosition(positionId, oldLocked, emptyLockedBalance(), now);
    moveDelegatedPositions(this.state, delegateOf(this.state, owner), undefined, [positionId], now);
    this.burn(positionId, now);

    const returned = value - penalty;
    if (returned > 0n) {
      this.pushTo(owner, returned);
    }
    if (penalty > 0n) {
      this.pushTo(this.state.settings.treasury, penalty);
    }

    this.emit(penalty > 0n ? 'LIQUIDATE' : 'WITHDRAW', now, {
      accountId: caller,
      positionId,
      details: { owner, value: value.toString(), returned: returned.toString(), penalty: penalty.toString() },
    });
    this.emit('SUPPLY', now, {
      details: { supplyBefore: supplyBefore.toString(), supply: this.state.supply.toString() },
    });
    return { returned, penalty };
  }

  private delegateInternal(account: string, delegatee: string): void {
    const now = this.clock.now();
    const previous = setDelegate(this.state, account, delegatee, now);
    this.emit('DELEGATE_CHANGED', now, {
      accountId: account,
      details: { fromDelegate: previous, toDelegate: delegatee },
    });
  }

  private checkpointPosition(
    positionId: number,
    oldLocked: LockedBalance,
    newLocked: LockedBalance,
    now: number
  ): void {
    checkpoint(this.state, {
      positionId,
      oldLocked,
      newLocked,
      voting: !this.isNonVoting(positionId),
      now,
      blockNumber: this.clock.blockNumber(),
    });
  }

  private pullFrom(payer: string, amount: bigint): void {
    const custody = this.state.settings.custodyAccount;
    const before = this.token.balanceOf(custody);
    if (!this.token.transferFrom(custody, payer, custody, toUint256(amount))) {
      throw new LedgerError(
        ErrorCodes.TRANSFER_FAILED,
        `Transfer of ${amount} from ${payer} into custody failed`,
        { payer, amount: amount.toString() }
      );
    }
    const received = this.token.balanceOf(custody) - before;
    if (received !== amount) {
      throw new LedgerError(
        ErrorCodes.TRANSFER_FAILED,
        `Custody received ${received}, expected ${amount}`,
        { received: received.toString(), expected: amount.toString() }
      );
    }
  }

  private pushTo(recipient: string, amount: bigint): void {
    const custody = this.state.settings.custodyAccount;
    if (!this.token.transfer(custody, recipient, toUint256(amount))) {
      throw new LedgerError(
        ErrorCodes.TRANSFER_FAILED,
        `Transfer of ${amount} from custody to ${recipient} failed`,
        { recipient, amount: amount.toString() }
      );
    }
  }

  private mint(to: string, positionId: number, now: number): void {
    this.state.owners.set(positionId, to);
    this.addToOwner(to, positionId);
    this.state.structuralChange.set(positionId, now);
    this.emit('TRANSFER', now, { accountId: to, positionId, details: { from: '', to } });
  }

  private burn(positionId: number, now: number): void {
    const owner = this.requireOwned(positionId);
    this.state.approvals.delete(positionId);
    this.removeFromOwner(owner, positionId);
    this.state.owners.delete(positionId);
    this.emit('TRANSFER', now, { accountId: owner, positionId, details: { from: owner, to: '' } });
  }

  private addToOwner(owner: string, positionId: number): void {
    const owned = this.state.ownerTokens.get(owner) ?? [];
    owned.push(positionId);
    owned.sort((a, b) => a - b);
    this.state.ownerTokens.set(owner, owned);
  }

  private removeFromOwner(owner: string, positionId: number): void {
    const owned = (this.state.ownerTokens.get(owner) ?? []).filter(id => id !== positionId);
    if (owned.length > 0) {
      this.state.ownerTokens.set(owner, owned);
    } else {
      this.state.ownerTokens.delete(owner);
    }
  }

  private unlockTimeFor(now: number, duration: number): number {
    if (!Number.isInteger(duration) || duration < 0) {
      throw new LedgerError(
        ErrorCodes.LOCK_DURATION_NOT_IN_FUTURE,
        `Lock duration must be a non-negative whole number of seconds: ${duration}`
      );
    }
    return floorToWeek(toUint48(now + duration));
  }

  private requireWithinMaxTime(unlockTime: number, now: number): void {
    if (unlockTime > now + MAXTIME) {
      throw new LedgerError(
        ErrorCodes.LOCK_DURATION_TOO_LONG,
        `Unlock time ${unlockTime} is more than 4 years away`,
        { unlockTime, max: now + MAXTIME }
      );
    }
  }

  private requireOwned(positionId: number): string {
    const owner = this.state.owners.get(positionId);
    if (owner === undefined) {
      throw new LedgerError(ErrorCodes.NO_LOCK_FOUND, `Position ${positionId} does not exist`, {
        positionId,
      });
    }
    return owner;
  }

  private requireApprovedOrOwner(caller: string, positionId: number): string {
    const owner = this.requireOwned(positionId);
    if (!this.isApprovedOrOwner(caller, positionId)) {
      throw new LedgerError(
        ErrorCodes.NOT_AUTHORIZED,
        `${caller} is not owner or approved for position ${positionId}`,
        { caller, positionId }
      );
    }
    return owner;
  }

  private requireExistingLock(positionId: number): LockedBalance {
    const locked = this.locked(positionId);
    if (locked.amount <= 0n) {
      throw new LedgerError(ErrorCodes.NO_LOCK_FOUND, `No lock found for position ${positionId}`, {
        positionId,
      });
    }
    return locked;
  }

  private requireActiveLock(positionId: number, now: number): LockedBalance {
    const locked = this.requireExistingLock(positionId);
    if (locked.end <= now) {
      throw new LedgerError(ErrorCodes.LOCK_EXPIRED, `Lock of position ${positionId} has expired`, {
        positionId,
        end: locked.end,
      });
    }
    return locked;
  }

  private requireNotAttached(positionId: number): void {
    if (this.nodeProperties?.isAttached(positionId)) {
      throw new LedgerError(ErrorCodes.ATTACHED, `Position ${positionId} is attached to a node`, {
        positionId,
      });
    }
  }

  private requireNoUnclaimedRewards(positionId: number): void {
    const unclaimed = this.rewards?.unclaimedRewards(positionId) ?? 0n;
    if (unclaimed > 0n) {
      throw new LedgerError(
        ErrorCodes.UNCLAIMED_REWARDS,
        `Position ${positionId} has ${unclaimed} unclaimed rewards`,
        { positionId, unclaimed: unclaimed.toString() }
      );
    }
  }

  private requireNoStructuralChange(positionId: number, now: number): void {
    if (this.state.structuralChange.get(positionId) === now) {
      throw new LedgerError(
        ErrorCodes.FLASH_PROTECTION,
        `Position ${positionId} already changed hands at ${now}`,
        { positionId, now }
      );
    }
  }

  private updateSettings(caller: string, changes: Partial<EscrowSettings>): void {
    this.guard.mutate(() => {
      requireGovernor(this.state, caller);
      this.state.settings = { ...this.state.settings, ...changes };
      const details: Record<string, string | number | boolean> = {};
      for (const [key, value] of Object.entries(changes)) {
        if (value === undefined) continue;
        details[key] = typeof value === 'bigint' ? value.toString() : value;
      }
      this.emit('SETTINGS_CHANGED', this.clock.now(), { accountId: caller, details });
    });
  }

  private emit(
    eventType: LedgerEventType,
    timestamp: number,
    fields: Pick<LedgerEvent, 'details'> & Partial<Pick<LedgerEvent, 'accountId' | 'positionId'>>
  ): void {
    this.state.events.push({
      eventType,
      timestamp,
      blk: this.clock.blockNumber(),
      ...fields,
    });
  }
}
