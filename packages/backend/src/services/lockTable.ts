import { holdsLocks, type Operation } from '@switchyard/domain';
import { LockFailedError } from '../httpError.js';

export type LockMode = 'shared' | 'exclusive';

export type LockClaim = {
  component: string;
  mode: LockMode;
};

export type LockEntry = {
  component: string;
  mode: LockMode;
  holders: number[];
};

type HeldLock = {
  mode: LockMode;
  holders: Set<number>;
};

/**
 * Component-level mutual exclusion: any number of shared holders, or exactly one
 * exclusive holder, never both. An entry only exists while someone holds it.
 */
export class LockTable {
  private readonly entries: Map<string, HeldLock>;

  constructor(entries: Map<string, HeldLock> = new Map()) {
    this.entries = entries;
  }

  acquire(component: string, mode: LockMode, holder: number): void {
    const current = this.entries.get(component);

    if (!current) {
      this.entries.set(component, { mode, holders: new Set([holder]) });
      return;
    }

    if (current.holders.size === 1 && current.holders.has(holder)) {
      current.mode = mode;
      return;
    }

    if (mode === 'exclusive' || current.mode === 'exclusive') {
      throw new LockFailedError(component);
    }

    current.holders.add(holder);
  }

  /** Acquires every claim or none of them. */
  acquireAll(holder: number, claims: readonly LockClaim[]): void {
    const trial = this.clone();

    for (const claim of claims) {
      trial.acquire(claim.component, claim.mode, holder);
    }

    this.replaceWith(trial);
  }

  release(component: string, holder: number): void {
    const current = this.entries.get(component);

    if (!current) {
      return;
    }

    current.holders.delete(holder);
    if (current.holders.size === 0) {
      this.entries.delete(component);
    }
  }

  releaseHolder(holder: number): void {
    for (const component of [...this.entries.keys()]) {
      this.release(component, holder);
    }
  }

  modeOf(component: string): LockMode | null {
    return this.entries.get(component)?.mode ?? null;
  }

  clone(): LockTable {
    return new LockTable(
      new Map(
        [...this.entries].map(([component, held]): [string, HeldLock] => [
          component,
          { mode: held.mode, holders: new Set(held.holders) }
        ])
      )
    );
  }

  list(): LockEntry[] {
    return [...this.entries]
      .map(([component, held]) => ({
        component,
        mode: held.mode,
        holders: [...held.holders].sort((a, b) => a - b)
      }))
      .sort((a, b) => (a.component < b.component ? -1 : a.component > b.component ? 1 : 0));
  }

  private replaceWith(other: LockTable): void {
    this.entries.clear();
    for (const [component, held] of other.entries) {
      this.entries.set(component, held);
    }
  }
}

const exclusiveClaims = (operation: Pick<Operation, 'locks'>): LockClaim[] =>
  operation.locks.map((component): LockClaim => ({ component, mode: 'exclusive' }));

/**
 * Claims an operation needs to start against `table`, which must no longer hold the
 * operation itself. Locked components are claimed exclusively. A component it only touches
 * is claimed shared while another operation locks it, so that start fails on the conflict;
 * otherwise the operation holds nothing on it.
 */
export const requiredClaims = (
  operation: Pick<Operation, 'components' | 'locks'>,
  table: LockTable
): LockClaim[] => [
  ...exclusiveClaims(operation),
  ...operation.components
    .filter((component) => !operation.locks.includes(component) && table.modeOf(component) === 'exclusive')
    .map((component): LockClaim => ({ component, mode: 'shared' }))
];

/**
 * Rebuilds the table held by in-progress and paused operations. Shared claims never outlive
 * the start that made them, so only the locks remain.
 */
export const deriveLockTable = (operations: Iterable<Operation>): LockTable => {
  const table = new LockTable();
  const active = [...operations].filter((operation) => holdsLocks(operation.status)).sort((a, b) => a.id - b.id);

  for (const operation of active) {
    table.acquireAll(operation.id, exclusiveClaims(operation));
  }

  return table;
};
