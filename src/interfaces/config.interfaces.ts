import { LogLevel } from './logger.interfaces.js';

export interface AppConfig {
    wingetExecutable: string;
    silentInstall: boolean;
    unknownVersionMarkers: string[];
    exportDirectory: string;
    logLevel: LogLevel;
    logDirectory: string;
    logToFile: boolean;
}
