/**
 * True when the probed address must be pushed. With nothing cached yet the
 * answer is always yes.
 */
export function hasChanged(candidate: string, cached: string | null): boolean {
    return cached === null || candidate !== cached;
}
