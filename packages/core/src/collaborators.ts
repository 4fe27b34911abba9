import { ConfigurationError } from './errors.js';

export type LedgerChargeResult =
  | { readonly success: true; readonly balance: number }
  | {
      readonly success: false;
      readonly code: 'InsufficientFunds';
      readonly balance: number;
    };

/**
 * Currency owner. The engine only charges and refunds; balances and their
 * storage belong to the host.
 */
export interface Ledger {
  charge(consumerId: string, amount: number, reason?: string): LedgerChargeResult;
  credit(consumerId: string, amount: number, reason?: string): void;
}

/**
 * Supplies a consumer's credit score. Hosts without one fall back to the
 * configured default score.
 */
export interface RatingProvider {
  getScore(consumerId: string): number;
}

export type AcquisitionResult =
  | { readonly success: true }
  | { readonly success: false; readonly message: string };

/**
 * Turns a purchased catalog key into a real item owned by the consumer.
 */
export interface AcquisitionProvider {
  materialize(catalogKey: string, consumerId: string): AcquisitionResult;
}

export interface PrerequisiteProvider {
  /** Number of times the consumer has used the diagnostic service. */
  getUsageCount(consumerId: string): number;
  /**
   * Reliability ceilings (0..1) of every item the consumer owns.
   */
  getResourceCeilings(consumerId: string): readonly number[];
}

export type LedgerOperationKind = 'Charge' | 'Credit';

export interface LedgerOperation {
  readonly sequence: number;
  readonly consumerId: string;
  readonly kind: LedgerOperationKind;
  readonly amount: number;
  readonly balanceAfter: number;
  readonly reason?: string;
}

export interface InMemoryLedgerOptions {
  readonly initialBalances?: Readonly<Record<string, number>>;
}

export class InMemoryLedger implements Ledger {
  private readonly balances = new Map<string, number>();

  private readonly operations: LedgerOperation[] = [];

  constructor(options: InMemoryLedgerOptions = {}) {
    for (const [consumerId, balance] of Object.entries(
      options.initialBalances ?? {},
    )) {
      assertAmount(balance);
      this.balances.set(consumerId, balance);
    }
  }

  charge(consumerId: string, amount: number, reason?: string): LedgerChargeResult {
    assertAmount(amount);
    const balance = this.getBalance(consumerId);
    if (amount > balance) {
      return { success: false, code: 'InsufficientFunds', balance };
    }

    const balanceAfter = balance - amount;
    this.balances.set(consumerId, balanceAfter);
    this.record(consumerId, 'Charge', amount, balanceAfter, reason);
    return { success: true, balance: balanceAfter };
  }

  credit(consumerId: string, amount: number, reason?: string): void {
    assertAmount(amount);
    const balanceAfter = this.getBalance(consumerId) + amount;
    this.balances.set(consumerId, balanceAfter);
    this.record(consumerId, 'Credit', amount, balanceAfter, reason);
  }

  getBalance(consumerId: string): number {
    return this.balances.get(consumerId) ?? 0;
  }

  getOperations(consumerId?: string): readonly LedgerOperation[] {
    if (consumerId === undefined) {
      return [...this.operations];
    }
    return this.operations.filter((operation) => operation.consumerId === consumerId);
  }

  private record(
    consumerId: string,
    kind: LedgerOperationKind,
    amount: number,
    balanceAfter: number,
    reason: string | undefined,
  ): void {
    this.operations.push({
      sequence: this.operations.length + 1,
      consumerId,
      kind,
      amount,
      balanceAfter,
      ...(reason === undefined ? {} : { reason }),
    });
  }
}

function assertAmount(amount: number): void {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new ConfigurationError(
      `Ledger amounts must be finite and non-negative (received ${amount}).`,
    );
  }
}
