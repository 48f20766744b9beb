import { InstallFailureEntry, PackageUpdate } from '../interfaces/index.js';

export class InstallFailure extends Error {
    readonly update: PackageUpdate;
    readonly diagnostic: string;

    constructor(update: PackageUpdate, diagnostic: string) {
        super(`Failed to install ${update.name} (${update.id}): ${diagnostic}`);
        this.name = 'InstallFailure';
        this.update = update;
        this.diagnostic = diagnostic;
    }

    toEntry(): InstallFailureEntry {
        return { name: this.update.name, id: this.update.id, error: this.diagnostic };
    }
}
