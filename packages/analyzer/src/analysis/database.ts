/**
 * Storage of completed contract analyses
 */

import { Result } from "#result";
import type { QualifiedContractIdentifier } from "#types";

import type { ContractAnalysis } from "./contract-analysis.js";
import { CheckErrors, type CheckError } from "./errors.js";

/**
 * Read path used by analysis passes to reach other contracts, plus the
 * single write a contract's own analysis makes when it succeeds.
 *
 * Passes receive the database explicitly; nothing is shared between runs
 * except through it.
 */
export interface AnalysisDatabase {
  loadContract(id: QualifiedContractIdentifier): ContractAnalysis | undefined;
  hasContract(id: QualifiedContractIdentifier): boolean;
  insertContract(analysis: ContractAnalysis): Result<void, CheckError>;

  begin(): void;
  commit(): void;
  rollback(): void;

  /**
   * Runs `fn` inside a transaction: its writes are kept if it succeeds
   * and discarded if it fails
   */
  execute<T, E>(fn: (db: AnalysisDatabase) => Result<T, E>): Result<T, E>;
}

/**
 * In-process database with nested transactions
 */
export class MemoryAnalysisDatabase implements AnalysisDatabase {
  private readonly committed = new Map<string, ContractAnalysis>();
  private readonly transactions: Map<string, ContractAnalysis>[] = [];

  loadContract(id: QualifiedContractIdentifier): ContractAnalysis | undefined {
    const key = id.toString();
    for (let i = this.transactions.length - 1; i >= 0; i--) {
      const found = this.transactions[i].get(key);
      if (found) {
        return found;
      }
    }
    return this.committed.get(key);
  }

  hasContract(id: QualifiedContractIdentifier): boolean {
    return this.loadContract(id) !== undefined;
  }

  insertContract(analysis: ContractAnalysis): Result<void, CheckError> {
    const id = analysis.contractIdentifier;
    if (this.hasContract(id)) {
      return Result.err(CheckErrors.contractAlreadyExists(id.toString()));
    }
    const target =
      this.transactions[this.transactions.length - 1] ?? this.committed;
    target.set(id.toString(), analysis);
    return Result.ok(undefined);
  }

  begin(): void {
    this.transactions.push(new Map());
  }

  commit(): void {
    const top = this.transactions.pop();
    if (!top) {
      throw new Error("commit() without a matching begin()");
    }
    const target =
      this.transactions[this.transactions.length - 1] ?? this.committed;
    for (const [key, analysis] of top) {
      target.set(key, analysis);
    }
  }

  rollback(): void {
    if (!this.transactions.pop()) {
      throw new Error("rollback() without a matching begin()");
    }
  }

  execute<T, E>(fn: (db: AnalysisDatabase) => Result<T, E>): Result<T, E> {
    this.begin();
    const result = fn(this);
    if (result.success) {
      this.commit();
    } else {
      this.rollback();
    }
    return result;
  }

  /** Identifiers of every visible contract, sorted */
  contracts(): string[] {
    const keys = new Set(this.committed.keys());
    for (const transaction of this.transactions) {
      for (const key of transaction.keys()) {
        keys.add(key);
      }
    }
    return [...keys].sort();
  }
}
