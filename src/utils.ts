import * as fsPromises from 'fs/promises';
import * as path from 'path';

let verbose = false;

/**
 * Turns debug output on or off. Debug lines are off by default so that they
 * never interleave with XML written to stdout.
 */
export function setVerbose(enabled: boolean) {
    verbose = enabled;
}

export function isVerbose(): boolean {
    return verbose;
}

export function dbg(s: string) {
    if (verbose) {
        console.debug(s);
    }
}

/**
 * Returns the message of an error-like value, or its string form.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Persists the given content to the specified file.
 *
 * @param content - The string content to save to file.
 * @param outputPath - Path of the file to create or overwrite.
 * @param resolveFn - Function to resolve file paths (defaults to path.resolve).
 * @param writeFileFn - Function to write files (defaults to fs.promises.writeFile).
 * @throws Logs the error and re-throws it to allow the caller to handle it.
 */
export async function persistOutput(
    content: string,
    outputPath: string,
    resolveFn: (...paths: string[]) => string = path.resolve,
    writeFileFn: (file: string, data: string, encoding: BufferEncoding) => Promise<void> = fsPromises.writeFile
): Promise<void> {
    const resolvedPath = resolveFn(outputPath);
    try {
        await writeFileFn(resolvedPath, content, 'utf-8');
        dbg(`Output saved to: ${resolvedPath}`);
    } catch (error) {
        console.error(`Error saving output to ${resolvedPath}:`, error);
        throw error;
    }
}
