export const ErrorCodes = {
  // Validation (2xxx)
  VALIDATION_ERROR: 'VAL_2001',

  // Request (4xxx)
  BAD_REQUEST: 'REQ_4001',

  // Resource (3xxx)
  NOT_FOUND: 'RES_3001',
  CONFLICT: 'RES_3002',

  // Server (5xxx)
  INTERNAL_ERROR: 'SRV_5001',

  // Registration (7xxx)
  CAPACITY_EXCEEDED: 'REG_7001',
  REGISTRATION_FAILED: 'REG_7002',
  LOCK_TIMEOUT: 'REG_7003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
