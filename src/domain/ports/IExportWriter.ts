import { ExportBundle } from '../entities/ExportBundle';

/**
 * Port for persisting a generation export.
 */
export interface IExportWriter {
    /**
     * Writes the bundle and returns the path it was written to.
     */
    write(bundle: ExportBundle, fileName: string): Promise<string>;
}
