import { isDeepStrictEqual } from 'node:util';
import {
  canTransition,
  createEmptySubscriptionSet,
  holdsLocks,
  INITIAL_OPERATION_ID,
  sortUnique,
  validateStoreSnapshot,
  type Component,
  type Operation,
  type StoreSnapshot,
  type SubscriptionSet,
  type Tag,
  type User
} from '@switchyard/domain';
import {
  AlreadyExistsError,
  InvalidStateTransitionError,
  LockingNonAffectedComponentError,
  NotFoundError,
  SubscribingMultipleEntitiesError,
  UnmetDependencyError
} from '../httpError.js';
import type { Logger } from '../logger.js';
import { Broadcaster, type BroadcastReceiver } from './broadcaster.js';
import type {
  CreateComponentInput,
  CreateOperationInput,
  CreateTagInput,
  OperationFilter,
  SubscriptionTarget,
  UpdateOperationInput
} from './inputs.js';
import { deriveLockTable, LockTable, requiredClaims, type LockEntry } from './lockTable.js';
import { normalizeIds, normalizeNames, requireHttpUrl, requireItems, requireText } from './validation.js';

export const DEFAULT_BROADCAST_CAPACITY = 1024;

export type CoordinatorOptions = {
  logger: Logger;
  broadcastCapacity?: number;
};

export type WatchHandle = {
  operations: Operation[];
  receiver: BroadcastReceiver<Operation>;
};

const clone = <T>(value: T): T => JSON.parse(JSON.stringify(value));

const byName = <T extends { name: string }>(a: T, b: T) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);

const overlaps = (values: readonly string[], filter: readonly string[] | undefined): boolean =>
  !filter?.length || values.some((value) => filter.includes(value));

/**
 * Owns every entity and the component lock table.
 *
 * Each mutating method runs synchronously from validation through commit and never yields,
 * so on Node's single thread it is an exclusive critical section: readers and other writers
 * only ever observe committed state. Committed operation changes are handed to the
 * broadcaster afterwards; delivery to sockets happens in each watcher's own loop.
 */
export class ChangeCoordinator {
  private readonly users = new Map<string, User>();
  private readonly components = new Map<string, Component>();
  private readonly tags = new Map<string, Tag>();
  private readonly operations = new Map<number, Operation>();
  private locks = new LockTable();
  private nextId: number;
  private readonly broadcaster: Broadcaster<Operation>;
  private readonly logger: Logger;

  constructor({ logger, broadcastCapacity = DEFAULT_BROADCAST_CAPACITY }: CoordinatorOptions, nextId?: number) {
    this.logger = logger;
    this.broadcaster = new Broadcaster<Operation>(broadcastCapacity);
    this.nextId = nextId ?? INITIAL_OPERATION_ID;
  }

  static fromSnapshot(input: StoreSnapshot, options: CoordinatorOptions): ChangeCoordinator {
    const snapshot = validateStoreSnapshot(input);
    const coordinator = new ChangeCoordinator(options, snapshot.nextId);

    for (const user of snapshot.users) {
      coordinator.users.set(user.name, user);
    }
    for (const component of snapshot.components) {
      coordinator.components.set(component.name, component);
    }
    for (const tag of snapshot.tags) {
      coordinator.tags.set(tag.name, tag);
    }
    for (const operation of snapshot.operations) {
      coordinator.operations.set(operation.id, operation);
    }

    try {
      coordinator.locks = deriveLockTable(coordinator.operations.values());
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Persisted operations hold conflicting locks: ${reason}`);
    }

    options.logger.info(
      {
        users: coordinator.users.size,
        components: coordinator.components.size,
        tags: coordinator.tags.size,
        operations: coordinator.operations.size,
        locks: coordinator.locks.list().length
      },
      'restored coordinator state'
    );

    return coordinator;
  }

  toSnapshot(): StoreSnapshot {
    return clone({
      nextId: this.nextId,
      users: [...this.users.values()].sort(byName),
      components: [...this.components.values()].sort(byName),
      tags: [...this.tags.values()].sort(byName),
      operations: [...this.operations.values()].sort((a, b) => a.id - b.id)
    });
  }

  // Users

  getUser(name: string): User {
    return clone(this.userOrThrow(name));
  }

  createUser(rawName: string): User {
    const name = requireText(rawName, 'name');

    if (this.users.has(name)) {
      throw new AlreadyExistsError('user', name);
    }

    const user: User = { name, subscriptions: createEmptySubscriptionSet() };
    this.users.set(name, user);
    this.logger.info({ user: name }, 'created user');
    return clone(user);
  }

  ensureUser(rawName: string): User {
    const existing = this.users.get(rawName.trim());
    return existing ? clone(existing) : this.createUser(rawName);
  }

  // Components

  getComponent(name: string): Component {
    return clone(this.componentOrThrow(name));
  }

  listComponents(): Component[] {
    return clone([...this.components.values()].sort(byName));
  }

  createComponent(input: CreateComponentInput): Component {
    const component: Component = {
      name: requireText(input.name, 'name'),
      description: requireText(input.description, 'description'),
      owners: requireItems(normalizeNames(input.owners), 'owner')
    };

    for (const owner of component.owners) {
      this.userOrThrow(owner);
    }

    if (this.components.has(component.name)) {
      throw new AlreadyExistsError('component', component.name);
    }

    this.components.set(component.name, component);
    return clone(component);
  }

  // Tags

  getTag(name: string): Tag {
    return clone(this.tagOrThrow(name));
  }

  listTags(): Tag[] {
    return clone([...this.tags.values()].sort(byName));
  }

  createTag(input: CreateTagInput): Tag {
    const tag: Tag = {
      name: requireText(input.name, 'name'),
      description: requireText(input.description, 'description')
    };

    if (this.tags.has(tag.name)) {
      throw new AlreadyExistsError('tag', tag.name);
    }

    this.tags.set(tag.name, tag);
    return clone(tag);
  }

  // Operations

  getOperation(id: number): Operation {
    return clone(this.operationOrThrow(id));
  }

  listOperations(filter: OperationFilter = {}): Operation[] {
    const matches = [...this.operations.values()].filter(
      (operation) =>
        overlaps(operation.components, filter.components) &&
        overlaps(operation.tags, filter.tags) &&
        overlaps(operation.operators, filter.operators) &&
        (!filter.statuses?.length || filter.statuses.includes(operation.status))
    );

    return clone(matches.sort((a, b) => a.id - b.id));
  }

  createOperation(requester: string, input: CreateOperationInput): Operation {
    const operators = input.operators?.length ? input.operators : [requester];

    return this.upsertOperation(
      {
        id: this.nextId,
        title: input.title,
        purpose: input.purpose,
        url: input.url,
        components: input.components,
        locks: input.locks ?? [],
        tags: input.tags ?? [],
        dependsOn: input.dependsOn ?? [],
        operators,
        status: 'planned',
        annotations: input.annotations ?? {}
      },
      true
    );
  }

  updateOperation(id: number, patch: UpdateOperationInput): Operation {
    const current = this.operationOrThrow(id);

    return this.upsertOperation({
      id,
      title: patch.title ?? current.title,
      purpose: patch.purpose ?? current.purpose,
      url: patch.url ?? current.url,
      components: patch.components ?? current.components,
      locks: patch.locks ?? current.locks,
      tags: patch.tags ?? current.tags,
      dependsOn: patch.dependsOn ?? current.dependsOn,
      operators: patch.operators ?? current.operators,
      status: patch.status ?? current.status,
      annotations: { ...current.annotations, ...patch.annotations }
    });
  }

  listLocks(): LockEntry[] {
    return this.locks.list();
  }

  // Subscriptions

  subscribe(username: string, target: SubscriptionTarget): SubscriptionSet {
    const specified = [target.operation, target.component, target.tag].filter((value) => value !== undefined);

    if (specified.length !== 1) {
      throw new SubscribingMultipleEntitiesError();
    }

    const user = this.userOrThrow(username);
    const subscriptions = user.subscriptions;

    if (target.operation !== undefined) {
      this.operationOrThrow(target.operation);
      subscriptions.operations = sortUnique([...subscriptions.operations, target.operation]);
    } else if (target.component !== undefined) {
      const component = this.componentOrThrow(target.component.trim());
      subscriptions.components = sortUnique([...subscriptions.components, component.name]);
    } else if (target.tag !== undefined) {
      const tag = this.tagOrThrow(target.tag.trim());
      subscriptions.tags = sortUnique([...subscriptions.tags, tag.name]);
    }

    return clone(subscriptions);
  }

  listSubscriptions(username: string): SubscriptionSet {
    return clone(this.userOrThrow(username).subscriptions);
  }

  /**
   * Current operations plus a receiver for every later change. Both are taken in the same
   * synchronous step, so no change falls between them.
   */
  watch(): WatchHandle {
    return {
      operations: this.listOperations(),
      receiver: this.broadcaster.subscribe()
    };
  }

  get watcherCount(): number {
    return this.broadcaster.receiverCount;
  }

  close(): void {
    this.broadcaster.close();
  }

  private upsertOperation(candidate: Operation, isNew = false): Operation {
    const operation = this.validateOperation(candidate);
    const current = isNew ? undefined : this.operations.get(operation.id);

    if (current) {
      if (!canTransition(current.status, operation.status)) {
        throw new InvalidStateTransitionError(current.status, operation.status);
      }
    } else if (operation.status !== 'planned') {
      throw new Error(`New operation ${operation.id} must start as planned, not ${operation.status}`);
    }

    if (operation.status === 'in_progress') {
      for (const dependency of operation.dependsOn) {
        if (this.operationOrThrow(dependency).status !== 'completed') {
          throw new UnmetDependencyError(dependency);
        }
      }
    }

    const locks = this.planLocks(current, operation);

    if (isNew) {
      this.nextId = operation.id + 1;
    }
    this.operations.set(operation.id, operation);
    if (locks) {
      this.locks = locks;
    }

    const committed = clone(operation);
    if (!current || !isDeepStrictEqual(current, operation)) {
      const receivers = this.broadcaster.send(committed);
      this.logger.debug({ operation: operation.id, status: operation.status, receivers }, 'broadcast operation');
    }

    return clone(committed);
  }

  /** Returns the lock table to commit, or null when the operation neither held nor needs locks. */
  private planLocks(current: Operation | undefined, operation: Operation): LockTable | null {
    const heldBefore = current ? holdsLocks(current.status) : false;
    const holdsAfter = holdsLocks(operation.status);

    if (!heldBefore && !holdsAfter) {
      return null;
    }

    // Touched components are checked against other locks on entering in_progress, or when newly added.
    const entering = operation.status === 'in_progress' && current?.status !== 'in_progress';
    const touchedBefore = current && heldBefore && !entering ? current.components : [];

    const next = this.locks.clone();
    next.releaseHolder(operation.id);
    if (holdsAfter) {
      const claims = requiredClaims(operation, next).filter(
        (claim) => claim.mode === 'exclusive' || !touchedBefore.includes(claim.component)
      );
      next.acquireAll(operation.id, claims);
    }
    return next;
  }

  private validateOperation(candidate: Operation): Operation {
    const title = requireText(candidate.title, 'title');
    const purpose = requireText(candidate.purpose, 'purpose');
    const url = requireHttpUrl(candidate.url);

    const components = requireItems(normalizeNames(candidate.components), 'component');
    for (const component of components) {
      this.componentOrThrow(component);
    }

    const locks = normalizeNames(candidate.locks);
    for (const lock of locks) {
      if (!components.includes(lock)) {
        throw new LockingNonAffectedComponentError(lock);
      }
    }

    const tags = normalizeNames(candidate.tags);
    for (const tag of tags) {
      this.tagOrThrow(tag);
    }

    const dependsOn = normalizeIds(candidate.dependsOn);
    for (const dependency of dependsOn) {
      this.operationOrThrow(dependency);
    }

    const operators = requireItems(normalizeNames(candidate.operators), 'operator');
    for (const operator of operators) {
      this.userOrThrow(operator);
    }

    return {
      id: candidate.id,
      title,
      purpose,
      url,
      components,
      locks,
      tags,
      dependsOn,
      operators,
      status: candidate.status,
      annotations: { ...candidate.annotations }
    };
  }

  private userOrThrow(name: string): User {
    const user = this.users.get(name);
    if (!user) {
      throw new NotFoundError('user', name);
    }
    return user;
  }

  private componentOrThrow(name: string): Component {
    const component = this.components.get(name);
    if (!component) {
      throw new NotFoundError('component', name);
    }
    return component;
  }

  private tagOrThrow(name: string): Tag {
    const tag = this.tags.get(name);
    if (!tag) {
      throw new NotFoundError('tag', name);
    }
    return tag;
  }

  private operationOrThrow(id: number): Operation {
    const operation = this.operations.get(id);
    if (!operation) {
      throw new NotFoundError('operation', id);
    }
    return operation;
  }
}
