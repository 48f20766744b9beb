/**
 * One installed package as reported by `winget list`.
 */
export interface Package {
    readonly name: string;
    readonly id: string;
    /** May be `Unknown` or carry a `<` marker when winget cannot read it precisely. */
    readonly version: string;
    /** Empty when the package is not attributable to any catalog. */
    readonly source: string;
}

export type UpdateCategory = 'regular' | 'explicit' | 'unknown';

interface PackageUpdateBase extends Package {
    readonly availableVersion: string;
}

export interface RegularUpdate extends PackageUpdateBase {
    readonly category: 'regular';
    readonly isUnknownVersion: false;
    readonly requiresExplicitUpgrade: false;
}

/**
 * Listed under "require explicit targeting"; winget only applies it when the
 * package is named on the command line.
 */
export interface ExplicitUpdate extends PackageUpdateBase {
    readonly category: 'explicit';
    readonly isUnknownVersion: false;
    readonly requiresExplicitUpgrade: true;
}

export interface UnknownVersionUpdate extends PackageUpdateBase {
    readonly category: 'unknown';
    readonly isUnknownVersion: true;
    readonly requiresExplicitUpgrade: false;
}

export type PackageUpdate = RegularUpdate | ExplicitUpdate | UnknownVersionUpdate;

export interface UpgradeListing {
    regular: RegularUpdate[];
    explicit: ExplicitUpdate[];
    unknown: UnknownVersionUpdate[];
}

export interface PackageSplit {
    /** Packages whose source is the winget community catalog. */
    wingetPackages: Package[];
    otherPackages: Package[];
}

export interface ExportedPackage {
    id: string;
    version?: string;
    source: string;
}

export interface ExportSnapshot {
    path: string;
    /** Display names winget reported as "not available from any source". */
    unavailable: string[];
}

export interface AvailabilityStatus {
    available: boolean;
    version?: string;
    error?: string;
}
