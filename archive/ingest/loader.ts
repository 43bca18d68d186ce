/**
 * Weather Archive - Document Loader
 *
 * Loads a whole JSON document (an array of record objects, or one record
 * object) into an archive. Every record is decoded before any is inserted,
 * so a failing document leaves the archive exactly as it was.
 */
/* eslint-disable no-console */

import { readFile } from 'node:fs/promises';
import { WeatherArchive } from '../archive';
import { decodeRecord, parseJsonDocument } from '../codec';
import type { WeatherRecord } from '../types';

export type LoadResult =
    | {
          ok: true;
          archive: WeatherArchive;
          /** Records placed in the archive */
          loaded: number;
          /** Records dropped for lack of a timestamp */
          skipped: number;
      }
    | { ok: false; error: string };

/**
 * Decode every record in a parsed document.
 * Fails on the first element that is not an object.
 */
export function decodeDocument(document: unknown): { ok: true; records: WeatherRecord[] } | { ok: false; error: string } {
    if (Array.isArray(document)) {
        const records: WeatherRecord[] = [];
        for (let i = 0; i < document.length; i++) {
            const decoded = decodeRecord(document[i]);
            if (!decoded.ok) {
                return { ok: false, error: `record ${i}: ${decoded.error}` };
            }
            records.push(decoded.record);
        }
        return { ok: true, records };
    }

    if (typeof document === 'object' && document !== null) {
        const decoded = decodeRecord(document);
        return decoded.ok ? { ok: true, records: [decoded.record] } : decoded;
    }

    console.warn('[ingest] document is neither an array nor an object; nothing to load', {
        type: document === null ? 'null' : typeof document
    });
    return { ok: true, records: [] };
}

/**
 * Parse and load JSON text into `archive` (a new archive by default).
 */
export function loadArchiveFromText(text: string, archive: WeatherArchive = new WeatherArchive()): LoadResult {
    const parsed = parseJsonDocument(text);
    if (!parsed.ok) return parsed;

    const decoded = decodeDocument(parsed.value);
    if (!decoded.ok) return decoded;

    const loaded = archive.addAll(decoded.records);
    const skipped = decoded.records.length - loaded;
    if (skipped > 0) {
        console.warn(`[ingest] Skipped ${skipped} record(s) without a valid date`);
    }
    return { ok: true, archive, loaded, skipped };
}

/**
 * Read a JSON file and load it. Read failures come back as `{ ok: false }`.
 */
export async function loadArchiveFromFile(
    filePath: string,
    archive: WeatherArchive = new WeatherArchive()
): Promise<LoadResult> {
    let text: string;
    try {
        text = await readFile(filePath, 'utf-8');
    } catch (error) {
        return { ok: false, error: error instanceof Error ? error.message : String(error) };
    }

    return loadArchiveFromText(text, archive);
}
