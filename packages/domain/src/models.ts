export const OPERATION_STATES = [
  'planned',
  'in_progress',
  'paused',
  'completed',
  'aborted',
  'canceled'
] as const;

export type OperationState = (typeof OPERATION_STATES)[number];

export type SubscriptionSet = {
  operations: number[];
  components: string[];
  tags: string[];
};

export type User = {
  name: string;
  subscriptions: SubscriptionSet;
};

export type Component = {
  name: string;
  description: string;
  owners: string[];
};

export type Tag = {
  name: string;
  description: string;
};

export type Operation = {
  id: number;
  title: string;
  purpose: string;
  url: string;
  components: string[];
  locks: string[];
  tags: string[];
  dependsOn: number[];
  operators: string[];
  status: OperationState;
  annotations: Record<string, string>;
};

export type StoreSnapshot = {
  nextId: number;
  users: User[];
  components: Component[];
  tags: Tag[];
  operations: Operation[];
};

export const INITIAL_OPERATION_ID = 1234;

const TRANSITIONS: Record<OperationState, readonly OperationState[]> = {
  planned: ['in_progress', 'canceled'],
  in_progress: ['paused', 'completed', 'aborted'],
  paused: ['in_progress'],
  completed: [],
  aborted: [],
  canceled: []
};

export const isOperationState = (value: unknown): value is OperationState =>
  typeof value === 'string' && (OPERATION_STATES as readonly string[]).includes(value);

export const canTransition = (from: OperationState, to: OperationState): boolean =>
  from === to || TRANSITIONS[from].includes(to);

export const isTerminalState = (state: OperationState): boolean => TRANSITIONS[state].length === 0;

/** States in which an operation keeps its component locks. */
export const holdsLocks = (state: OperationState): boolean => state !== 'planned' && !isTerminalState(state);

export const createEmptySubscriptionSet = (): SubscriptionSet => ({
  operations: [],
  components: [],
  tags: []
});

export const matchesSubscription = (subscriptions: SubscriptionSet, operation: Operation): boolean =>
  subscriptions.operations.includes(operation.id) ||
  operation.components.some((component) => subscriptions.components.includes(component)) ||
  operation.tags.some((tag) => subscriptions.tags.includes(tag));

export const sortUnique = <T extends string | number>(values: readonly T[]): T[] =>
  [...new Set(values)].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

type UnknownRecord = Record<string, unknown>;

const asRecord = (value: unknown): UnknownRecord =>
  value && typeof value === 'object' && !Array.isArray(value) ? (value as UnknownRecord) : {};

const ensureString = (value: unknown, fallback = ''): string => {
  if (typeof value === 'string' && value.trim().length > 0) {
    return value.trim();
  }

  return fallback;
};

const ensureStringArray = (value: unknown): string[] => {
  if (!Array.isArray(value)) {
    return [];
  }

  return sortUnique(value.map((item) => ensureString(item)).filter((item) => item.length > 0));
};

const ensureId = (value: unknown): number | null =>
  typeof value === 'number' && Number.isSafeInteger(value) && value >= 0 ? value : null;

const ensureIdArray = (value: unknown): number[] => {
  if (!Array.isArray(value)) {
    return [];
  }

  return sortUnique(value.map(ensureId).filter((id): id is number => id !== null));
};

const ensureAnnotations = (value: unknown): Record<string, string> =>
  Object.fromEntries(
    Object.entries(asRecord(value)).filter(
      (entry): entry is [string, string] => typeof entry[1] === 'string'
    )
  );

const sanitizeSubscriptionSet = (raw: unknown): SubscriptionSet => {
  const candidate = asRecord(raw);

  return {
    operations: ensureIdArray(candidate.operations),
    components: ensureStringArray(candidate.components),
    tags: ensureStringArray(candidate.tags)
  };
};

const sanitizeUser = (raw: unknown): User => {
  const candidate = asRecord(raw);

  return {
    name: ensureString(candidate.name),
    subscriptions: sanitizeSubscriptionSet(candidate.subscriptions)
  };
};

const sanitizeComponent = (raw: unknown): Component => {
  const candidate = asRecord(raw);

  return {
    name: ensureString(candidate.name),
    description: ensureString(candidate.description),
    owners: ensureStringArray(candidate.owners)
  };
};

const sanitizeTag = (raw: unknown): Tag => {
  const candidate = asRecord(raw);

  return {
    name: ensureString(candidate.name),
    description: ensureString(candidate.description)
  };
};

const sanitizeOperation = (raw: unknown): Operation | null => {
  const candidate = asRecord(raw);
  const id = ensureId(candidate.id);

  if (id === null || !isOperationState(candidate.status)) {
    return null;
  }

  return {
    id,
    title: ensureString(candidate.title),
    purpose: ensureString(candidate.purpose),
    url: ensureString(candidate.url),
    components: ensureStringArray(candidate.components),
    locks: ensureStringArray(candidate.locks),
    tags: ensureStringArray(candidate.tags),
    dependsOn: ensureIdArray(candidate.dependsOn),
    operators: ensureStringArray(candidate.operators),
    status: candidate.status,
    annotations: ensureAnnotations(candidate.annotations)
  };
};

const uniqueBy = <T, K>(items: T[], key: (item: T) => K): T[] => {
  const seen = new Set<K>();

  return items.filter((item) => {
    const value = key(item);
    if (seen.has(value)) {
      return false;
    }
    seen.add(value);
    return true;
  });
};

const sanitizeList = <T>(raw: unknown, sanitize: (value: unknown) => T | null): T[] =>
  Array.isArray(raw) ? raw.map(sanitize).filter((item): item is T => item !== null) : [];

export const createEmptyStoreSnapshot = (): StoreSnapshot => ({
  nextId: INITIAL_OPERATION_ID,
  users: [],
  components: [],
  tags: [],
  operations: []
});

/**
 * Normalises an externally loaded snapshot. Entries without an identifier, or operations
 * with an unknown status, are dropped; `nextId` never falls at or below a stored id.
 */
export const validateStoreSnapshot = (input: unknown): StoreSnapshot => {
  const candidate = asRecord(input);

  const users = uniqueBy(
    sanitizeList(candidate.users, sanitizeUser).filter((user) => Boolean(user.name)),
    (user) => user.name
  );
  const components = uniqueBy(
    sanitizeList(candidate.components, sanitizeComponent).filter((component) => Boolean(component.name)),
    (component) => component.name
  );
  const tags = uniqueBy(
    sanitizeList(candidate.tags, sanitizeTag).filter((tag) => Boolean(tag.name)),
    (tag) => tag.name
  );
  const operations = uniqueBy(sanitizeList(candidate.operations, sanitizeOperation), (operation) => operation.id)
    .sort((a, b) => a.id - b.id);

  const storedNextId = ensureId(candidate.nextId) ?? INITIAL_OPERATION_ID;
  const highestId = operations.reduce((max, operation) => Math.max(max, operation.id), -1);

  return {
    nextId: Math.max(storedNextId, highestId + 1),
    users,
    components,
    tags,
    operations
  };
};
