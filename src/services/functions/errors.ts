class PropagationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * The engine went past the configured step budget without any condition
 * becoming true. Terminal, never retried.
 */
class StepBudgetExceededError extends PropagationError {
  readonly stepsDone: number
  readonly maxSteps: number

  constructor(stepsDone: number, maxSteps: number) {
    super(`Engine produced ${stepsDone} steps (>= ${maxSteps}).`)
    this.stepsDone = stepsDone
    this.maxSteps = maxSteps
  }
}

class OutputAlreadyExistsError extends PropagationError {
  readonly path: string

  constructor(path: string, inFlight = false) {
    super(
      inFlight
        ? `Output ${path} is already being written by another stitch.`
        : `Output ${path} exists and overwrite is not permitted.`
    )
    this.path = path
  }
}

class InconsistentConditionShapeError extends PropagationError {
  readonly conditionIndex: number
  readonly expected: number
  readonly actual: number

  constructor(conditionIndex: number, expected: number, actual: number) {
    super(
      `Condition ${conditionIndex} returned ${actual} values for a trajectory with ${expected} frames.`
    )
    this.conditionIndex = conditionIndex
    this.expected = expected
    this.actual = actual
  }
}

class NoConditionFulfilledError extends PropagationError {
  constructor(what: string) {
    super(`No condition is fulfilled on any frame of ${what}.`)
  }
}

export {
  PropagationError,
  StepBudgetExceededError,
  OutputAlreadyExistsError,
  InconsistentConditionShapeError,
  NoConditionFulfilledError
}
