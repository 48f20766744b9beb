import { readFileSync } from 'fs';
import { z } from 'zod';
import { ExportedPackage } from '../interfaces/index.js';
import { splitTerminalLines } from './text.utils.js';

const UNAVAILABLE_MARKER = 'Installed package is not available from any source:';

/**
 * Shape of the file written by `winget export`
 */
export const WingetExportSchema = z.object({
    CreationDate: z.string().optional(),
    WinGetVersion: z.string().optional(),
    Sources: z
        .array(
            z.object({
                SourceDetails: z
                    .object({
                        Name: z.string(),
                        Argument: z.string().optional(),
                        Identifier: z.string().optional(),
                        Type: z.string().optional(),
                    })
                    .optional(),
                Packages: z
                    .array(
                        z.object({
                            PackageIdentifier: z.string().min(1),
                            Version: z.string().optional(),
                        })
                    )
                    .default([]),
            })
        )
        .default([]),
});

/**
 * Names from "Installed package is not available from any source: <name>" lines
 */
export function parseUnavailablePackages(output: string): string[] {
    const names: string[] = [];
    for (const line of splitTerminalLines(output)) {
        const markerIndex = line.indexOf(UNAVAILABLE_MARKER);
        if (markerIndex === -1) continue;

        const name = line.slice(markerIndex + UNAVAILABLE_MARKER.length).trim();
        if (name) names.push(name);
    }
    return names;
}

/**
 * Flatten a validated export document into one entry per package
 */
export function parseExportDocument(document: unknown): ExportedPackage[] {
    const parsed = WingetExportSchema.parse(document);
    return parsed.Sources.flatMap((source) =>
        source.Packages.map((pkg) => ({
            id: pkg.PackageIdentifier,
            version: pkg.Version,
            source: source.SourceDetails?.Name ?? '',
        }))
    );
}

/**
 * Read a file produced by `winget export`. It may start with a byte order mark.
 */
export function readExportFile(filePath: string): ExportedPackage[] {
    const content = readFileSync(filePath, 'utf8').replace(/^\uFEFF/, '');
    return parseExportDocument(JSON.parse(content));
}
