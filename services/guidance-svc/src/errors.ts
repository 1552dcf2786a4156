import { ServiceError } from '@career-guidance/common';

import type { LearnerSnapshot } from './types';

/**
 * Failures raised by the guidance core. All of them report `origin: 'core'`.
 */
export class InvalidCodeError extends ServiceError {
  constructor(public readonly input: string, reason: string) {
    super(`Invalid RIASEC code "${input}": ${reason}`, {
      statusCode: 400,
      code: 'invalid_riasec_code',
      origin: 'core',
      details: { input, reason }
    });
    this.name = 'InvalidCodeError';
  }
}

export class InconsistentStateError extends ServiceError {
  constructor(public readonly snapshot: LearnerSnapshot, public readonly violation: string) {
    super(`Learner ${snapshot.learnerId} has an inconsistent state: ${violation}`, {
      statusCode: 409,
      code: 'inconsistent_learner_state',
      origin: 'core',
      details: { violation, snapshot: { ...snapshot } }
    });
    this.name = 'InconsistentStateError';
  }
}

export class CollaboratorUnavailableError extends ServiceError {
  constructor(public readonly collaborator: string, operation: string, cause?: unknown) {
    super(`${collaborator} is unavailable (${operation}).`, {
      statusCode: 503,
      code: 'collaborator_unavailable',
      origin: 'core',
      details: { collaborator, operation },
      cause
    });
    this.name = 'CollaboratorUnavailableError';
  }
}
