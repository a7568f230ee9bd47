/**
 * Consolidated error system for the IPED task-matrix generator.
 *
 * All error classes extend IpedError, which carries a typed error code.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const IpedErrorCode = {
  // Design generation
  INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',
  INFEASIBLE_DESIGN: 'INFEASIBLE_DESIGN',
  INFEASIBLE_BALANCE: 'INFEASIBLE_BALANCE',

  // Matrix store
  DUPLICATE_KEY: 'DUPLICATE_KEY',
  NOT_FOUND: 'NOT_FOUND',
  INVALID_DATA: 'INVALID_DATA',
} as const

export type IpedErrorCode = (typeof IpedErrorCode)[keyof typeof IpedErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class IpedError extends Error {
  readonly code: IpedErrorCode

  constructor(code: IpedErrorCode, message: string) {
    super(message)
    this.name = 'IpedError'
    this.code = code
  }
}

// ============================================================================
// Design Errors
// ============================================================================

export class InvalidConfigurationError extends IpedError {
  constructor(message: string) {
    super(IpedErrorCode.INVALID_CONFIGURATION, message)
    this.name = 'InvalidConfigurationError'
  }
}

export class InfeasibleDesignError extends IpedError {
  constructor(message: string) {
    super(IpedErrorCode.INFEASIBLE_DESIGN, message)
    this.name = 'InfeasibleDesignError'
  }
}

export class InfeasibleBalanceError extends IpedError {
  readonly maxDeviation: number
  readonly allowedDeviation: number

  constructor(message: string, maxDeviation: number, allowedDeviation: number) {
    super(IpedErrorCode.INFEASIBLE_BALANCE, message)
    this.name = 'InfeasibleBalanceError'
    this.maxDeviation = maxDeviation
    this.allowedDeviation = allowedDeviation
  }
}

// ============================================================================
// Store Errors
// ============================================================================

export class DuplicateKeyError extends IpedError {
  constructor(message: string) {
    super(IpedErrorCode.DUPLICATE_KEY, message)
    this.name = 'DuplicateKeyError'
  }
}

export class NotFoundError extends IpedError {
  constructor(message: string) {
    super(IpedErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

export class InvalidDataError extends IpedError {
  constructor(message: string) {
    super(IpedErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}
