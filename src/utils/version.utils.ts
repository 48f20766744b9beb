export type UnknownVersionPredicate = (version: string) => boolean;

/**
 * Markers winget currently prints when it cannot read an installed version
 * (`< 1.2.3`, `Unknown`). They depend on the winget release, hence configurable.
 */
export const DEFAULT_UNKNOWN_VERSION_MARKERS: readonly string[] = ['<', 'Unknown'];

export function createUnknownVersionPredicate(markers: readonly string[] = DEFAULT_UNKNOWN_VERSION_MARKERS): UnknownVersionPredicate {
    const active = markers.filter((marker) => marker.length > 0);
    return (version) => active.some((marker) => version.includes(marker));
}

export const isUnknownVersion: UnknownVersionPredicate = createUnknownVersionPredicate();
