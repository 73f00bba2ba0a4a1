export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
    return e instanceof Error && 'code' in e;
}

export function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
