/* eslint-disable max-classes-per-file */

export class ScoreLengthMismatchError extends Error {
  constructor(guess: string, answer: string) {
    super(`SCORE_LENGTH_MISMATCH: guess "${guess}" (${guess.length}) and answer "${answer}" (${answer.length}) differ`)
    this.name = 'ScoreLengthMismatchError'
  }
}

export class UnknownSolverError extends Error {
  constructor(readonly solverId: string, readonly known: string[]) {
    super(`UNKNOWN_SOLVER: "${solverId}", known solvers: [${known.join(', ')}]`)
    this.name = 'UnknownSolverError'
  }
}

export class DuplicateSolverError extends Error {
  constructor(readonly solverId: string) {
    super(`DUPLICATE_SOLVER: "${solverId}" is already registered`)
    this.name = 'DuplicateSolverError'
  }
}

export class EpisodeFinishedError extends Error {
  constructor(status: string) {
    super(`EPISODE_FINISHED: episode is already ${status}, call reset() first!`)
    this.name = 'EpisodeFinishedError'
  }
}

export class UnknownActionError extends Error {
  constructor(readonly action: string, readonly known: string[]) {
    super(`UNKNOWN_ACTION: "${action}", known actions: [${known.join(', ')}]`)
    this.name = 'UnknownActionError'
  }
}

export class DimensionMismatchError extends Error {
  constructor(expected: number, received: number) {
    super(`DIMENSION_MISMATCH: expected a vector of length ${expected}, got ${received}`)
    this.name = 'DimensionMismatchError'
  }
}

export class InvalidSnapshotError extends Error {
  constructor(reason: string) {
    super(`INVALID_SNAPSHOT: ${reason}`)
    this.name = 'InvalidSnapshotError'
  }
}

export class InvalidConfigError extends Error {
  constructor(reason: string) {
    super(`INVALID_CONFIG: ${reason}`)
    this.name = 'InvalidConfigError'
  }
}
