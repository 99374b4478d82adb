import * as fs from 'fs';
import * as path from 'path';
import { MAX_EMBED_DEPTH } from '../config';
import { escapeXml } from '../render/xml';
import { dbg, errorMessage } from '../utils';
import { ExpansionError, isErrnoException } from './errors';

export type ReadFileSyncFn = (filePath: string) => string;

export interface ExpanderDependencies {
    readFileFn?: ReadFileSyncFn;
    resolvePathFn?: (...paths: string[]) => string;
    joinPathFn?: (...paths: string[]) => string;
    dirnameFn?: (p: string) => string;
    maxDepth?: number;
}

/**
 * A `>@path<` occurrence. `start` is the index of the `>` and `end` the index
 * of the terminating `<`; both characters stay in the output.
 */
export interface Placeholder {
    start: number;
    end: number;
    path: string;
}

const PLACEHOLDER_OPEN = '>';
const PLACEHOLDER_MARKER = '@';
const PLACEHOLDER_CLOSE = '<';

function isLineTerminator(ch: string): boolean {
    return ch === '\n' || ch === '\r' || ch === '\u0085' || ch === '\u2028' || ch === '\u2029';
}

/**
 * Finds every non-overlapping placeholder in `content`, left to right.
 *
 * A placeholder path runs up to the first `<` and may not cross a line
 * terminator. When a candidate hits a line terminator or the end of the text
 * first, every candidate that starts before that point fails the same way, so
 * scanning resumes from there and the whole scan stays linear.
 */
export function scanPlaceholders(content: string): Placeholder[] {
    const placeholders: Placeholder[] = [];
    let i = 0;
    while (i < content.length - 1) {
        if (content[i] !== PLACEHOLDER_OPEN || content[i + 1] !== PLACEHOLDER_MARKER) {
            i++;
            continue;
        }
        let j = i + 2;
        while (j < content.length && content[j] !== PLACEHOLDER_CLOSE && !isLineTerminator(content[j])) {
            j++;
        }
        if (j < content.length && content[j] === PLACEHOLDER_CLOSE) {
            placeholders.push({ start: i, end: j, path: content.slice(i + 2, j) });
            i = j + 1;
        } else {
            i = j;
        }
    }
    return placeholders;
}

/**
 * Replaces `>@relative/path<` placeholders with the XML-escaped content of
 * the referenced file. Embedded files are expanded first, relative to their
 * own directory, so a chain of files may keep embedding further files.
 *
 * For example, if `abc.xml` contains `<abc>value</abc>`, then
 * `<xyz>@abc.xml</xyz>` becomes `<xyz>&lt;abc&gt;value&lt;/abc&gt;</xyz>`.
 */
export class EmbeddingExpander {
    private readonly readFileFn: ReadFileSyncFn;
    private readonly resolvePathFn: (...paths: string[]) => string;
    private readonly joinPathFn: (...paths: string[]) => string;
    private readonly dirnameFn: (p: string) => string;
    private readonly maxDepth: number;

    constructor(deps?: ExpanderDependencies) {
        this.readFileFn = deps?.readFileFn || ((filePath: string) => fs.readFileSync(filePath, 'utf-8'));
        this.resolvePathFn = deps?.resolvePathFn || path.resolve;
        this.joinPathFn = deps?.joinPathFn || path.join;
        this.dirnameFn = deps?.dirnameFn || path.dirname;
        this.maxDepth = deps?.maxDepth ?? MAX_EMBED_DEPTH;
    }

    /**
     * Expands every placeholder in `content`, joining paths onto `baseDir`.
     * @throws ExpansionError on the first file that cannot be read, or when
     *         files embed each other in a cycle or nest deeper than maxDepth.
     */
    expand(content: string, baseDir: string): string {
        return this.expandWithin(content, baseDir, []);
    }

    /**
     * Reads `filePath` and expands it with the file's own directory as base.
     */
    expandFile(filePath: string): string {
        return this.expandFileWithin(this.resolvePathFn(filePath), []);
    }

    private expandWithin(content: string, baseDir: string, chain: readonly string[]): string {
        const placeholders = scanPlaceholders(content);
        if (placeholders.length === 0) {
            return content;
        }

        let output = '';
        let lastStart = 0;
        for (const placeholder of placeholders) {
            output += content.slice(lastStart, placeholder.start + 1);
            // Placeholder paths always descend from baseDir, even when they start with a separator.
            const embeddedPath = this.resolvePathFn(this.joinPathFn(baseDir, placeholder.path));
            dbg(`Embedding ${embeddedPath}`);
            output += escapeXml(this.expandFileWithin(embeddedPath, chain));
            lastStart = placeholder.end;
        }
        output += content.slice(lastStart);
        return output;
    }

    private expandFileWithin(filePath: string, chain: readonly string[]): string {
        if (chain.includes(filePath)) {
            throw new ExpansionError(
                'RecursionLimitExceeded',
                filePath,
                `Embedded file ${filePath} includes itself: ${[...chain, filePath].join(' -> ')}`
            );
        }
        if (chain.length >= this.maxDepth) {
            throw new ExpansionError(
                'RecursionLimitExceeded',
                filePath,
                `Embedding ${filePath} exceeds the maximum nesting depth of ${this.maxDepth}`
            );
        }
        const content = this.readFile(filePath);
        return this.expandWithin(content, this.dirnameFn(filePath), [...chain, filePath]);
    }

    private readFile(filePath: string): string {
        try {
            return this.readFileFn(filePath);
        } catch (error: unknown) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                throw new ExpansionError('FileNotFound', filePath, `File not found: ${filePath}`, { cause: error });
            }
            throw new ExpansionError('ReadFailed', filePath, `Reading file ${filePath} failed: ${errorMessage(error)}`, { cause: error });
        }
    }
}

/**
 * Expands `content` against `baseDir` with a default expander.
 */
export function resolveEmbeddedFiles(content: string, baseDir: string, deps?: ExpanderDependencies): string {
    return new EmbeddingExpander(deps).expand(content, baseDir);
}
