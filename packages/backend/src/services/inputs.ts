import { isOperationState, OPERATION_STATES, type OperationState } from '@switchyard/domain';
import { BadRequestError } from '../httpError.js';

export type CreateComponentInput = {
  name: string;
  description: string;
  owners: string[];
};

export type CreateTagInput = {
  name: string;
  description: string;
};

export type CreateOperationInput = {
  title: string;
  purpose: string;
  url: string;
  components: string[];
  locks?: string[];
  tags?: string[];
  dependsOn?: number[];
  operators?: string[];
  annotations?: Record<string, string>;
};

export type UpdateOperationInput = {
  title?: string;
  purpose?: string;
  url?: string;
  components?: string[];
  locks?: string[];
  tags?: string[];
  dependsOn?: number[];
  operators?: string[];
  status?: OperationState;
  annotations?: Record<string, string>;
};

export type SubscriptionTarget = {
  operation?: number;
  component?: string;
  tag?: string;
};

export type OperationFilter = {
  components?: string[];
  tags?: string[];
  operators?: string[];
  statuses?: OperationState[];
};

type UnknownRecord = Record<string, unknown>;

const asBody = (value: unknown): UnknownRecord => {
  if (value === undefined || value === null) {
    return {};
  }

  if (typeof value !== 'object' || Array.isArray(value)) {
    throw new BadRequestError('Request body must be a JSON object');
  }

  return value as UnknownRecord;
};

const isPresent = (value: unknown): boolean => value !== undefined && value !== null;

const readString = (body: UnknownRecord, field: string): string => {
  const value = body[field];

  if (!isPresent(value)) {
    return '';
  }

  if (typeof value !== 'string') {
    throw new BadRequestError(`${field} must be a string`, field);
  }

  return value;
};

const readStringList = (body: UnknownRecord, field: string): string[] => {
  const value = body[field];

  if (!isPresent(value)) {
    return [];
  }

  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new BadRequestError(`${field} must be a list of strings`, field);
  }

  return value;
};

export const parseOperationId = (value: unknown, field = 'id'): number => {
  const numeric = typeof value === 'string' && /^\d+$/.test(value.trim()) ? Number(value) : value;

  if (typeof numeric !== 'number' || !Number.isSafeInteger(numeric) || numeric < 0) {
    throw new BadRequestError(`${field} must be an operation id`, field);
  }

  return numeric;
};

const readIdList = (body: UnknownRecord, field: string): number[] => {
  const value = body[field];

  if (!isPresent(value)) {
    return [];
  }

  if (!Array.isArray(value)) {
    throw new BadRequestError(`${field} must be a list of operation ids`, field);
  }

  return value.map((item) => {
    if (typeof item !== 'number') {
      throw new BadRequestError(`${field} must be a list of operation ids`, field);
    }
    return parseOperationId(item, field);
  });
};

const readAnnotations = (body: UnknownRecord): Record<string, string> => {
  const value = body.annotations;

  if (!isPresent(value)) {
    return {};
  }

  if (typeof value !== 'object' || Array.isArray(value)) {
    throw new BadRequestError('annotations must be an object of strings', 'annotations');
  }

  const entries = Object.entries(value as UnknownRecord);
  if (!entries.every((entry): entry is [string, string] => typeof entry[1] === 'string')) {
    throw new BadRequestError('annotations must be an object of strings', 'annotations');
  }

  return Object.fromEntries(entries);
};

const readStatus = (value: unknown, field: string): OperationState => {
  if (!isOperationState(value)) {
    throw new BadRequestError(`${field} must be one of ${OPERATION_STATES.join(', ')}`, field);
  }

  return value;
};

export const parseCreateComponentInput = (raw: unknown): CreateComponentInput => {
  const body = asBody(raw);

  return {
    name: readString(body, 'name'),
    description: readString(body, 'description'),
    owners: readStringList(body, 'owners')
  };
};

export const parseCreateTagInput = (raw: unknown): CreateTagInput => {
  const body = asBody(raw);

  return {
    name: readString(body, 'name'),
    description: readString(body, 'description')
  };
};

export const parseCreateOperationInput = (raw: unknown): CreateOperationInput => {
  const body = asBody(raw);

  return {
    title: readString(body, 'title'),
    purpose: readString(body, 'purpose'),
    url: readString(body, 'url'),
    components: readStringList(body, 'components'),
    locks: readStringList(body, 'locks'),
    tags: readStringList(body, 'tags'),
    dependsOn: readIdList(body, 'dependsOn'),
    operators: readStringList(body, 'operators'),
    annotations: readAnnotations(body)
  };
};

/** Only fields present in the body end up in the patch. */
export const parseUpdateOperationInput = (raw: unknown): UpdateOperationInput => {
  const body = asBody(raw);
  const patch: UpdateOperationInput = {};

  for (const field of ['title', 'purpose', 'url'] as const) {
    if (isPresent(body[field])) {
      patch[field] = readString(body, field);
    }
  }

  for (const field of ['components', 'locks', 'tags', 'operators'] as const) {
    if (isPresent(body[field])) {
      patch[field] = readStringList(body, field);
    }
  }

  if (isPresent(body.dependsOn)) {
    patch.dependsOn = readIdList(body, 'dependsOn');
  }

  if (isPresent(body.status)) {
    patch.status = readStatus(body.status, 'status');
  }

  if (isPresent(body.annotations)) {
    patch.annotations = readAnnotations(body);
  }

  return patch;
};

export const parseSubscriptionTarget = (raw: unknown): SubscriptionTarget => {
  const body = asBody(raw);
  const target: SubscriptionTarget = {};

  if (isPresent(body.operation)) {
    target.operation = parseOperationId(body.operation, 'operation');
  }

  if (isPresent(body.component)) {
    target.component = readString(body, 'component');
  }

  if (isPresent(body.tag)) {
    target.tag = readString(body, 'tag');
  }

  return target;
};

const parseQueryValues = (value: unknown): string[] => {
  if (Array.isArray(value)) {
    return value.flatMap((item) => (typeof item === 'string' ? [item] : []));
  }

  return typeof value === 'string' ? [value] : [];
};

const sanitizeFilterValues = (values: string[]): string[] => {
  const deduplicated = new Set<string>();

  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed) {
      deduplicated.add(trimmed);
    }
  }

  return [...deduplicated];
};

const readFilter = (query: UnknownRecord, singular: string, plural: string): string[] =>
  sanitizeFilterValues([...parseQueryValues(query[singular]), ...parseQueryValues(query[plural])]);

export const parseOperationFilter = (raw: unknown): OperationFilter => {
  const query = asBody(raw);

  return {
    components: readFilter(query, 'component', 'components'),
    tags: readFilter(query, 'tag', 'tags'),
    operators: readFilter(query, 'operator', 'operators'),
    statuses: readFilter(query, 'status', 'statuses').map((status) => readStatus(status, 'status'))
  };
};
