import { Entity, Feed, Value, assertNever } from '../entity/entity_types';
import { TAB_STOP } from '../config';
import { escapeXml } from './xml';

/**
 * Anything text can be written to: process.stdout, a file stream, a StringSink.
 */
export interface OutputSink {
    write(chunk: string): unknown;
}

/**
 * Collects written text in memory.
 */
export class StringSink implements OutputSink {
    private readonly chunks: string[] = [];

    write(chunk: string): void {
        this.chunks.push(chunk);
    }

    toString(): string {
        return this.chunks.join('');
    }
}

/**
 * Output position of one rendering operation: the sink being written to and
 * the current indentation. Each render owns its cursor, so concurrent renders
 * never share indentation state.
 */
export class RenderCursor {
    private indentation = 0;

    constructor(readonly out: OutputSink, readonly tabStop: number = TAB_STOP) {}

    get level(): number {
        return this.indentation;
    }

    indentMore(): void {
        this.indentation += this.tabStop;
    }

    indentLess(): void {
        this.indentation -= this.tabStop;
    }

    /** Writes indentation followed by `s`, without a line break. */
    print(s: string): void {
        this.out.write(' '.repeat(this.indentation) + s);
    }

    /** Writes indentation, `s` and a line break. */
    println(s: string): void {
        this.out.write(' '.repeat(this.indentation) + s + '\n');
    }

    /** Writes `s` with no indentation. */
    append(s: string): void {
        this.out.write(s);
    }

    /**
     * Runs `body` one indentation step deeper and restores the previous level
     * afterwards, including when `body` throws.
     */
    nested(body: () => void): void {
        this.indentMore();
        try {
            body();
        } finally {
            this.indentLess();
        }
    }
}

export function writeFeed(feed: Feed, cursor: RenderCursor): void {
    cursor.println('<entities>');
    cursor.nested(() => {
        for (const entity of feed) {
            writeEntity(entity, cursor);
        }
    });
    cursor.println('</entities>');
}

export function writeEntity(entity: Entity, cursor: RenderCursor): void {
    cursor.println('<entity>');
    cursor.nested(() => writeFields(entity, cursor));
    cursor.println('</entity>');
}

export function writeFields(entity: Entity, cursor: RenderCursor): void {
    for (const [name, value] of entity.fields) {
        writeField(name, value, cursor);
    }
}

export function writeField(name: string, value: Value, cursor: RenderCursor): void {
    switch (value.kind) {
        case 'scalar':
            cursor.print(`<${name}>`);
            cursor.append(`${escapeXml(value.value)}</${name}>\n`);
            break;
        case 'entity': {
            const sub: Entity = value;
            cursor.println(`<${name}>`);
            cursor.nested(() => writeFields(sub, cursor));
            cursor.println(`</${name}>`);
            break;
        }
        case 'repeated':
            writeRepeated(name, value.items, cursor);
            break;
        default:
            assertNever(value);
    }
}

function writeRepeated(name: string, items: readonly Value[], cursor: RenderCursor): void {
    items.forEach((item, i) => {
        cursor.print(`<${name}${i === 0 ? ' repeatable="true"' : ''}>`);
        switch (item.kind) {
            case 'scalar':
                cursor.append(`${escapeXml(item.value)}</${name}>\n`);
                break;
            case 'entity': {
                const sub: Entity = item;
                cursor.append('\n');
                cursor.nested(() => writeFields(sub, cursor));
                cursor.println(`</${name}>`);
                break;
            }
            case 'repeated': {
                // A nested group is written as its own run of elements inside this one.
                const group = item.items;
                cursor.append('\n');
                cursor.nested(() => writeRepeated(name, group, cursor));
                cursor.println(`</${name}>`);
                break;
            }
            default:
                assertNever(item);
        }
    });
}

export function renderFeed(feed: Feed, tabStop: number = TAB_STOP): string {
    const sink = new StringSink();
    writeFeed(feed, new RenderCursor(sink, tabStop));
    return sink.toString();
}

export function renderEntity(entity: Entity, tabStop: number = TAB_STOP): string {
    const sink = new StringSink();
    writeEntity(entity, new RenderCursor(sink, tabStop));
    return sink.toString();
}

export function renderField(name: string, value: Value, tabStop: number = TAB_STOP): string {
    const sink = new StringSink();
    writeField(name, value, new RenderCursor(sink, tabStop));
    return sink.toString();
}
