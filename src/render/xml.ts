const XML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&apos;',
};

/**
 * Escapes a string for use as XML text or attribute content.
 * A null or undefined value escapes to the empty string.
 */
export function escapeXml(value: string | null | undefined): string {
    if (value === null || value === undefined) {
        return '';
    }
    return value.replace(/[&<>"']/g, ch => XML_ESCAPES[ch] ?? ch);
}
