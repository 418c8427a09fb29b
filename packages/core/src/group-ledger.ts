/**
 * Group fund ledger.
 *
 * Tracks each group's prepaid balance. Deposits are forwarded to the escrow
 * that actually pays for sponsored execution; debits happen at settlement and
 * are unconditional, so a balance can fall below zero when the real cost of an
 * operation exceeds the estimate it was authorized against.
 */

import { auditEntry, AuditLogger, DepositEscrow, GroupDepositStore } from './types';
import { validateAmount, validatePositiveAmount, validateUint256 } from './validation';

export class GroupLedger {
  private readonly store: GroupDepositStore;
  private readonly escrow: DepositEscrow;
  private readonly auditLogger?: AuditLogger;

  constructor(store: GroupDepositStore, escrow: DepositEscrow, auditLogger?: AuditLogger) {
    this.store = store;
    this.escrow = escrow;
    this.auditLogger = auditLogger;
  }

  /**
   * Credit a group and forward the funds to the escrow.
   *
   * @returns The group's new balance
   * @throws SponsorValidationError (code ZERO_AMOUNT) if amount is not positive
   */
  async deposit(groupId: bigint, amount: bigint): Promise<bigint> {
    validateUint256(groupId, 'groupId');
    validatePositiveAmount(amount, 'amount');

    await this.escrow.depositTo(amount);
    const balance = (await this.balanceOf(groupId)) + amount;
    await this.store.setDeposit(groupId, balance);

    this.auditLogger?.log(
      auditEntry('deposit', 'group-ledger', true, groupId.toString(), {
        amount,
        balance,
      }),
    );
    return balance;
  }

  async hasSufficientBalance(groupId: bigint, requiredAmount: bigint): Promise<boolean> {
    return (await this.balanceOf(groupId)) >= requiredAmount;
  }

  /**
   * Subtract a settled cost. No balance check: the operation has already
   * executed by the time this runs.
   *
   * @returns The group's new balance, possibly negative
   */
  async debit(groupId: bigint, amount: bigint): Promise<bigint> {
    validateAmount(amount, 'amount');
    const balance = (await this.balanceOf(groupId)) - amount;
    await this.store.setDeposit(groupId, balance);
    return balance;
  }

  /** Balance of a group; groups never funded read as 0. */
  async balanceOf(groupId: bigint): Promise<bigint> {
    return (await this.store.getDeposit(groupId)) ?? 0n;
  }
}

// ---------------------------------------------------------------------------
// In-memory implementations
// ---------------------------------------------------------------------------

export class InMemoryGroupDepositStore implements GroupDepositStore {
  private deposits = new Map<bigint, bigint>();

  constructor() {
    if (typeof process !== 'undefined' && process.env.NODE_ENV === 'production') {
      console.warn(
        '[gas-sponsor] InMemoryGroupDepositStore is not suitable for production. ' +
          'Group balances will be lost on restart. Use a persistent store (Redis).',
      );
    }
  }

  async getDeposit(groupId: bigint): Promise<bigint | null> {
    return this.deposits.get(groupId) ?? null;
  }

  async setDeposit(groupId: bigint, amount: bigint): Promise<void> {
    this.deposits.set(groupId, amount);
  }
}

/**
 * Escrow that only counts what it holds.
 */
export class InMemoryEscrow implements DepositEscrow {
  private total = 0n;

  async depositTo(amount: bigint): Promise<void> {
    this.total += amount;
  }

  async getDeposit(): Promise<bigint> {
    return this.total;
  }
}
