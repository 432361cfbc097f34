export type AuthErrorCode =
    | 'INVALID_EMAIL'
    | 'INVALID_NAME'
    | 'INVALID_PASSWORD'
    | 'EMAIL_EXISTS'
    | 'LOGIN_ID_EXISTS'
    | 'INVALID_CREDENTIALS'
    | 'INVALID_TOKEN'
    | 'TOKEN_REVOKED'
    | 'TOKEN_EXPIRED'
    | 'USER_NOT_FOUND'
    | 'PUBLIC_GROUP_NOT_FOUND';

const MESSAGES: Record<AuthErrorCode, string> = {
    INVALID_EMAIL: 'invalid email format',
    INVALID_NAME: 'name must have at least one locale value',
    INVALID_PASSWORD: 'password must be at least 8 characters',
    EMAIL_EXISTS: 'email already exists',
    LOGIN_ID_EXISTS: 'login_id already exists',
    INVALID_CREDENTIALS: 'invalid credentials',
    INVALID_TOKEN: 'invalid or expired token',
    TOKEN_REVOKED: 'token has been revoked',
    TOKEN_EXPIRED: 'token has expired',
    USER_NOT_FOUND: 'user not found',
    PUBLIC_GROUP_NOT_FOUND: 'public group not found',
};

export class AuthError extends Error {
    public readonly code: AuthErrorCode;

    constructor(code: AuthErrorCode, message = MESSAGES[code]) {
        super(message);
        this.name = 'AuthError';
        this.code = code;
    }
}

export function isAuthError(err: unknown, ...codes: AuthErrorCode[]): err is AuthError {
    return err instanceof AuthError && (codes.length === 0 || codes.includes(err.code));
}

export interface ErrorReply {
    status: number;
    error: string;
    message: string;
}

/** How each error kind is presented over HTTP */
export const AUTH_ERROR_RESPONSES: Record<AuthErrorCode, ErrorReply> = {
    INVALID_EMAIL: { status: 400, error: 'Bad Request', message: 'Invalid email format' },
    INVALID_NAME: { status: 400, error: 'Bad Request', message: 'Name must have at least one locale value' },
    INVALID_PASSWORD: { status: 400, error: 'Bad Request', message: 'Password must be at least 8 characters' },
    EMAIL_EXISTS: { status: 409, error: 'Conflict', message: 'Email already exists' },
    LOGIN_ID_EXISTS: { status: 409, error: 'Conflict', message: 'Login ID already exists' },
    INVALID_CREDENTIALS: { status: 401, error: 'Unauthorized', message: 'Invalid credentials' },
    INVALID_TOKEN: { status: 401, error: 'Unauthorized', message: 'Invalid refresh token' },
    TOKEN_REVOKED: { status: 401, error: 'Unauthorized', message: 'Token has been revoked. Please login again.' },
    TOKEN_EXPIRED: { status: 401, error: 'Unauthorized', message: 'Refresh token has expired. Please login again.' },
    USER_NOT_FOUND: { status: 404, error: 'Not Found', message: 'User not found' },
    PUBLIC_GROUP_NOT_FOUND: { status: 500, error: 'Internal Server Error', message: 'System configuration error' },
};
