import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

/**
 * UTC `YYYYMMDD_HHMMSS` stamp used in artifact file names.
 */
export function fileTimestamp(date: Date): string {
    const iso = date.toISOString();
    return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
}

/**
 * First base name under `dir` for which no `<base><extension>` file exists,
 * trying `baseName`, then `baseName_1`, `baseName_2`, ...
 * Creates `dir` when missing.
 */
export function freeBaseName(dir: string, baseName: string, extensions: readonly string[]): string {
    mkdirSync(dir, { recursive: true });

    for (let suffix = 0; ; suffix++) {
        const base = suffix === 0 ? baseName : `${baseName}_${suffix}`;
        if (!extensions.some((extension) => existsSync(join(dir, `${base}${extension}`)))) {
            return base;
        }
    }
}

/**
 * Write a new UTF-8 artifact. Fails with EEXIST instead of replacing a file.
 * Returns the full path.
 */
export function writeNewFile(dir: string, fileName: string, content: string): string {
    const filePath = join(dir, fileName);
    writeFileSync(filePath, content, { encoding: 'utf-8', flag: 'wx' });
    return filePath;
}

/**
 * Write `<baseName><extension>` under `dir`, or the first free suffixed name
 * when that file already exists. Returns the full path.
 */
export function writeArtifact(dir: string, baseName: string, extension: string, content: string): string {
    return writeNewFile(dir, `${freeBaseName(dir, baseName, [extension])}${extension}`, content);
}
