const OCTET = /^(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)$/;

/**
 * Strict dotted-quad check. Octets with a leading zero ("010") are rejected
 * since some parsers read them as octal.
 */
export function isValidIPv4(value: string): boolean {
    const parts = value.split('.');
    return parts.length === 4 && parts.every(part => OCTET.test(part));
}

/**
 * Normalizes a value read from a file or an HTTP body.
 * @returns the address, or null when the trimmed value is not a valid IPv4 address.
 */
export function parseAddress(raw: unknown): string | null {
    if (typeof raw !== 'string') return null;
    const trimmed = raw.trim();
    return isValidIPv4(trimmed) ? trimmed : null;
}
