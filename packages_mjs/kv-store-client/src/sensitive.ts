/**
 * Sensitive Value Detection and Masking
 */

const SENSITIVE_KEY_PATTERNS = [
    /KEY/i, /SECRET/i, /PASSWORD/i, /TOKEN/i,
    /CREDENTIAL/i, /AUTH/i, /PRIVATE/i
];

const SENSITIVE_VALUE_PREFIXES = [
    'hvs.', 's.', 'Bearer ', 'Basic ', 'eyJ'
];

export const REDACTED = '[REDACTED]';

let logMask = true;

if (typeof process !== 'undefined' && process.env.KVSYNC_LOG_MASK) {
    logMask = process.env.KVSYNC_LOG_MASK.toLowerCase() !== 'false';
}

export function setLogMask(enabled: boolean): void {
    logMask = enabled;
}

export function isSensitiveKey(key: string): boolean {
    return SENSITIVE_KEY_PATTERNS.some(p => p.test(key));
}

export function isSensitiveValue(value: string): boolean {
    if (!value) return false;
    return SENSITIVE_VALUE_PREFIXES.some(p => value.startsWith(p));
}

export function maskValue(key: string, value: unknown): string {
    if (!logMask) {
        return String(value);
    }

    if (value === undefined || value === null || value === '') return String(value);

    const strVal = String(value);

    if (isSensitiveKey(key) || isSensitiveValue(strVal)) {
        return REDACTED;
    }

    return strVal;
}

/**
 * Copy of a header map with sensitive values masked, for diagnostics.
 */
export function maskHeaders(headers: Record<string, string>): Record<string, string> {
    const masked: Record<string, string> = {};
    for (const [name, value] of Object.entries(headers)) {
        masked[name] = maskValue(name, value);
    }
    return masked;
}
