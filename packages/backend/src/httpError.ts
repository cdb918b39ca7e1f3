export type ErrorCode =
  | 'MissingToken'
  | 'InvalidToken'
  | 'NotFound'
  | 'AlreadyExists'
  | 'MissingItem'
  | 'BlankItem'
  | 'InvalidUrlScheme'
  | 'LockingNonAffectedComponent'
  | 'UnmetDependency'
  | 'InvalidStateTransition'
  | 'LockFailed'
  | 'SubscribingMultipleEntities'
  | 'InvalidRequest'
  | 'Internal';

export type EntityKind = 'user' | 'component' | 'tag' | 'operation';

export class HttpError extends Error {
  status: number;
  code: ErrorCode;
  details: Record<string, string>;

  constructor(status: number, code: ErrorCode, message: string, details: Record<string, string> = {}) {
    super(message);
    this.name = `${code}Error`;
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export class MissingTokenError extends HttpError {
  constructor(message = 'Missing authentication token') {
    super(401, 'MissingToken', message);
  }
}

export class InvalidTokenError extends HttpError {
  constructor(message = 'Invalid authentication token') {
    super(401, 'InvalidToken', message);
  }
}

export class NotFoundError extends HttpError {
  constructor(entity: EntityKind, id: string | number) {
    super(404, 'NotFound', `${entity} ${id} not found`, { entity, id: `${id}` });
  }
}

export class AlreadyExistsError extends HttpError {
  constructor(entity: EntityKind, id: string) {
    super(400, 'AlreadyExists', `${entity} ${id} already exists`, { entity, id });
  }
}

export class MissingItemError extends HttpError {
  constructor(item: string) {
    super(400, 'MissingItem', `at least one ${item} is required`, { item });
  }
}

export class BlankItemError extends HttpError {
  constructor(field: string) {
    super(400, 'BlankItem', `${field} cannot be blank`, { field });
  }
}

export class InvalidUrlSchemeError extends HttpError {
  constructor() {
    super(400, 'InvalidUrlScheme', 'url should have http or https scheme');
  }
}

export class LockingNonAffectedComponentError extends HttpError {
  constructor(component: string) {
    super(
      400,
      'LockingNonAffectedComponent',
      'locked component must be one of the affected components',
      { component }
    );
  }
}

export class UnmetDependencyError extends HttpError {
  constructor(dependency: number) {
    super(
      424,
      'UnmetDependency',
      'dependent operations must be completed before starting this operation',
      { dependency: `${dependency}` }
    );
  }
}

export class InvalidStateTransitionError extends HttpError {
  constructor(from: string, to: string) {
    super(400, 'InvalidStateTransition', `invalid state transition from ${from} to ${to}`, { from, to });
  }
}

export class LockFailedError extends HttpError {
  constructor(component: string) {
    super(423, 'LockFailed', `failed to acquire lock on component ${component}`, { component });
  }
}

export class SubscribingMultipleEntitiesError extends HttpError {
  constructor() {
    super(
      400,
      'SubscribingMultipleEntities',
      'exactly one of operation, component, or tag must be specified'
    );
  }
}

export class BadRequestError extends HttpError {
  constructor(message: string, field?: string) {
    super(400, 'InvalidRequest', message, field ? { field } : {});
  }
}

export class InternalError extends HttpError {
  constructor(message = 'Internal Server Error') {
    super(500, 'Internal', message);
  }
}
