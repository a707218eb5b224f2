/**
 * Shared utilities for source adapters.
 */

/**
 * A parsed XML element as produced by fast-xml-parser: child elements and
 * attributes keyed by name, text content under `#text`.
 */
export type XmlNode = Record<string, unknown>;

export function isXmlNode(value: unknown): value is XmlNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Normalize a possibly-repeated element to an array.
 */
export function asArray(value: unknown): unknown[] {
    if (value === undefined || value === null) return [];
    return Array.isArray(value) ? value : [value];
}

/**
 * Text content of an element, whether it was parsed as a bare value or as a
 * node with attributes (e.g. `<arxiv:comment xmlns:arxiv="...">text</arxiv:comment>`).
 */
export function textOf(value: unknown): string | null {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    if (isXmlNode(value)) return textOf(value['#text']);
    return null;
}

/**
 * Attribute value of an element, or null if absent.
 */
export function attrOf(value: unknown, name: string): string | null {
    if (!isXmlNode(value)) return null;
    return textOf(value[name]);
}

/**
 * Collapse runs of whitespace (including line breaks) to single spaces.
 * "Attention\n  Is All" → "Attention Is All"
 */
export function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

/**
 * Empty or whitespace-only strings become null.
 */
export function nonEmpty(text: string | null): string | null {
    if (text === null) return null;
    const trimmed = text.trim();
    return trimmed.length > 0 ? trimmed : null;
}
