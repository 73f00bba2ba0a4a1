export const ERROR_CODES = {
    // System / Generic
    E_UNKNOWN: { code: 'E_UNKNOWN', message: 'Internal Server Error' },
    E_VALIDATION: { code: 'E_VALIDATION', message: 'Invalid configuration value.' },
    E_NOT_FOUND: { code: 'E_NOT_FOUND', message: 'Not Found' },

    // Address file
    E_IP_UNAVAILABLE: { code: 'E_IP_UNAVAILABLE', message: 'IP address not available' },
    E_IP_INVALID: { code: 'E_IP_INVALID', message: 'Invalid IP address format' },
    E_FILE_ACCESS: { code: 'E_FILE_ACCESS', message: 'Internal Server Error' },

    // Startup
    E_PORT_IN_USE: { code: 'E_PORT_IN_USE', message: 'The specified port is already in use.' },
    E_PERMISSION_DENIED: { code: 'E_PERMISSION_DENIED', message: 'Permission denied.' },
    E_BIND_FAILED: { code: 'E_BIND_FAILED', message: 'Failed to start the HTTP listener.' },
} as const;

export type ErrorCode = keyof typeof ERROR_CODES;
