/**
 * Entity XML and its Atom envelope.
 *
 * An entity travels as `<entity>` XML inside an Atom entry's
 * `<content type="application/xml">`. Fields whose first occurrence carries
 * `repeatable="true"` are repeated values.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { Entity, Feed, Value, entityFromEntries, repeated, scalar } from '../entity/entity_types';
import { renderEntity } from '../render/XmlRenderer';
import { FeedClientError } from './errors';

export const ATOM_NAMESPACE = 'http://www.w3.org/2005/Atom';
export const ENTITY_CONTENT_TYPE = 'application/xml';

/**
 * Ordered mode keeps sibling order and repeated elements; each element becomes
 * `{ [name]: children, ':@': attributes }` and text becomes `{ '#text': value }`.
 * Text is kept untrimmed; whitespace between child elements is dropped by
 * `elementsOf`. `htmlEntities` adds decimal and hex character references to
 * the five predefined entities.
 */
const parserOptions = {
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    ignoreDeclaration: true,
    removeNSPrefix: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: false,
    htmlEntities: true,
};

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

type XmlNode = Record<string, unknown>;

interface XmlElement {
    name: string;
    children: unknown[];
    attributes: XmlNode;
}

function isXmlNode(value: unknown): value is XmlNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toElement(node: unknown): XmlElement | undefined {
    if (!isXmlNode(node)) {
        return undefined;
    }
    const name = Object.keys(node).find(key => key !== ATTRIBUTES_KEY && key !== TEXT_KEY);
    if (name === undefined) {
        return undefined;
    }
    const children = node[name];
    const attributes = node[ATTRIBUTES_KEY];
    return {
        name,
        children: Array.isArray(children) ? children : [],
        attributes: isXmlNode(attributes) ? attributes : {},
    };
}

function elementsOf(nodes: unknown[]): XmlElement[] {
    const elements: XmlElement[] = [];
    for (const node of nodes) {
        const element = toElement(node);
        if (element) {
            elements.push(element);
        }
    }
    return elements;
}

function textOf(nodes: unknown[]): string {
    return nodes
        .map(node => (isXmlNode(node) && TEXT_KEY in node ? String(node[TEXT_KEY]) : ''))
        .join('');
}

function childElement(parent: XmlElement, name: string): XmlElement | undefined {
    return elementsOf(parent.children).find(element => element.name === name);
}

function isRepeatable(element: XmlElement): boolean {
    return element.attributes['@_repeatable'] === 'true';
}

function parseDocument(xml: string): XmlElement {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
        const { msg, line, col } = validation.err;
        throw new FeedClientError(`Malformed XML at line ${line}, column ${col}: ${msg}`);
    }
    const parsed: unknown = new XMLParser(parserOptions).parse(xml);
    const root = Array.isArray(parsed) ? elementsOf(parsed)[0] : undefined;
    if (!root) {
        throw new FeedClientError('XML document has no root element');
    }
    return root;
}

function expectRoot(root: XmlElement, name: string): XmlElement {
    if (root.name !== name) {
        throw new FeedClientError(`Expected <${name}> root element, found <${root.name}>`);
    }
    return root;
}

function valueOf(children: unknown[]): Value {
    const elements = elementsOf(children);
    return elements.length > 0 ? entityOf(elements) : scalar(textOf(children));
}

/**
 * Builds an entity from sibling field elements. A field marked repeatable
 * collects every later element of the same name; an unmarked duplicate
 * replaces the earlier value.
 */
function entityOf(fieldElements: XmlElement[]): Entity {
    const groups = new Map<string, { repeatable: boolean; values: Value[] }>();
    for (const element of fieldElements) {
        const value = valueOf(element.children);
        const group = groups.get(element.name);
        if (!group) {
            groups.set(element.name, { repeatable: isRepeatable(element), values: [value] });
        } else if (group.repeatable || isRepeatable(element)) {
            group.repeatable = true;
            group.values.push(value);
        } else {
            group.values = [value];
        }
    }
    return entityFromEntries(
        Array.from(groups, ([name, group]): [string, Value] => [
            name,
            group.repeatable ? repeated(group.values) : group.values[0],
        ])
    );
}

function entryEntity(entry: XmlElement): Entity {
    const content = childElement(entry, 'content');
    const payload = content ? childElement(content, 'entity') : undefined;
    if (!payload) {
        throw new FeedClientError('Atom entry has no <content><entity> payload');
    }
    return entityOf(elementsOf(payload.children));
}

/**
 * Parses `<entity>` XML into an entity.
 * @throws FeedClientError if the XML is malformed or its root is not `<entity>`.
 */
export function parseEntityXml(xml: string): Entity {
    const root = expectRoot(parseDocument(xml), 'entity');
    return entityOf(elementsOf(root.children));
}

/**
 * Parses an Atom feed into its entities, in document order.
 */
export function parseFeedXml(xml: string): Feed {
    const feed = expectRoot(parseDocument(xml), 'feed');
    return elementsOf(feed.children)
        .filter(element => element.name === 'entry')
        .map(entryEntity);
}

/**
 * Parses a single Atom entry into its entity.
 */
export function parseEntryXml(xml: string): Entity {
    return entryEntity(expectRoot(parseDocument(xml), 'entry'));
}

/**
 * Wraps an entity in the Atom entry sent on insert and update.
 */
export function buildEntryXml(entity: Entity): string {
    return [
        '<?xml version="1.0" encoding="UTF-8"?>',
        `<entry xmlns="${ATOM_NAMESPACE}">`,
        `<content type="${ENTITY_CONTENT_TYPE}">`,
        renderEntity(entity) + '</content>',
        '</entry>',
        '',
    ].join('\n');
}
