import { XMLBuilder, XMLParser } from 'fast-xml-parser';

/** Value tree accepted by {@link toXml}; arrays become repeated sibling tags. */
export type XmlValue = string | number | XmlValue[] | { [tag: string]: XmlValue };

const CDATA_PROP = '__cdata';

const parser = new XMLParser({
    ignoreAttributes: true,
    parseTagValue: false,
    trimValues: true
});

const builder = new XMLBuilder({
    cdataPropName: CDATA_PROP,
    format: false
});

export class XmlDecodeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'XmlDecodeError';
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function collectFields(node: Record<string, unknown>, into: Record<string, string>): void {
    for (const [tag, value] of Object.entries(node)) {
        if (typeof value === 'string') {
            if (!(tag in into)) into[tag] = value;
        } else if (isRecord(value)) {
            collectFields(value, into);
        }
    }
}

/**
 * Decodes an `<xml>…</xml>` document into flat string fields. Children of
 * nested elements (e.g. `ScanCodeInfo`) are lifted to the top level; the
 * first occurrence of a tag wins and repeated tags are ignored.
 */
export function parseXmlFields(xml: string): Record<string, string> {
    let document: unknown;
    try {
        document = parser.parse(xml);
    } catch (error) {
        throw new XmlDecodeError(`Malformed XML: ${error instanceof Error ? error.message : String(error)}`);
    }

    const root = isRecord(document) ? document.xml : undefined;
    if (root === '') {
        return {};
    }
    if (!isRecord(root)) {
        throw new XmlDecodeError('XML document has no <xml> root element.');
    }

    const fields: Record<string, string> = {};
    collectFields(root, fields);
    return fields;
}

function wrapText(value: XmlValue): unknown {
    if (typeof value === 'string') {
        return { [CDATA_PROP]: value };
    }
    if (typeof value === 'number') {
        return value;
    }
    if (Array.isArray(value)) {
        return value.map(wrapText);
    }
    return Object.fromEntries(Object.entries(value).map(([tag, child]) => [tag, wrapText(child)]));
}

/** Encodes a value tree under an `<xml>` root; strings are written as CDATA. */
export function toXml(fields: { [tag: string]: XmlValue }): string {
    return builder.build({ xml: wrapText(fields) });
}
