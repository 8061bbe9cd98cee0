/**
 * conduit - Framework Errors
 *
 * Errors raised by misuse of the framework's own structures (stores, state,
 * route tables). They are faults, not HTTP outcomes: if one escapes the
 * middleware chain it is converted into a 500 like any other fault.
 */

/**
 * Base class of every framework error
 */
export class ConduitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConduitError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * `take`/`borrow` of a type that is not present in the request State
 */
export class StateAbsentError extends ConduitError {
  constructor(public readonly typeName: string) {
    super(`No value of type "${typeName}" is present in State`);
    this.name = 'StateAbsentError';
  }
}

/**
 * A handle was presented to a store outside the lineage that produced it
 */
export class ForeignHandleError extends ConduitError {
  constructor(storeName: string, index: number) {
    super(
      `Handle #${index} does not belong to store "${storeName}" or any of its ancestors`,
    );
    this.name = 'ForeignHandleError';
  }
}

/**
 * A builder was used after a call that consumed it
 */
export class BuilderConsumedError extends ConduitError {
  constructor(builderName: string) {
    super(
      `${builderName} has already been consumed; continue with the builder returned by the last call`,
    );
    this.name = 'BuilderConsumedError';
  }
}

/**
 * A frozen structure was asked to change
 */
export class FrozenStructureError extends ConduitError {
  constructor(structureName: string) {
    super(`${structureName} is frozen and cannot be modified`);
    this.name = 'FrozenStructureError';
  }
}

/**
 * The route table cannot be built as declared
 */
export class RouteConfigurationError extends ConduitError {
  constructor(
    message: string,
    public readonly pattern?: string,
  ) {
    super(pattern !== undefined ? `${message} (in "${pattern}")` : message);
    this.name = 'RouteConfigurationError';
  }
}
