/**
 * A single text value. A null value is rendered as empty content.
 */
export interface Scalar {
    readonly kind: 'scalar';
    readonly value: string | null;
}

/**
 * A field that occurs more than once within one entity, in occurrence order.
 */
export interface Repeated {
    readonly kind: 'repeated';
    readonly items: readonly Value[];
}

/**
 * One feed record: field names mapped to values. Field names are unique and
 * the map's insertion order is the order in which fields are rendered.
 */
export interface Entity {
    readonly kind: 'entity';
    readonly fields: ReadonlyMap<string, Value>;
}

export type Value = Scalar | Repeated | Entity;

/** Entities in server response order. */
export type Feed = readonly Entity[];

export type ScalarInput = string | number | boolean | null | undefined;

export function scalar(value: ScalarInput = null): Scalar {
    return { kind: 'scalar', value: value === null || value === undefined ? null : String(value) };
}

export function repeated(items: Iterable<Value>): Repeated {
    return { kind: 'repeated', items: Array.from(items) };
}

export function entity(fields: Readonly<Record<string, Value>> = {}): Entity {
    return entityFromEntries(Object.entries(fields));
}

/**
 * Builds an entity from name/value pairs. A later pair with an existing name
 * replaces the earlier value but keeps its position.
 */
export function entityFromEntries(entries: Iterable<readonly [string, Value]>): Entity {
    const fields = new Map<string, Value>();
    for (const [name, value] of entries) {
        fields.set(name, value);
    }
    return { kind: 'entity', fields };
}

export function assertNever(value: never): never {
    throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}
