/**
 * Coerce a message's content into the text that gets costed.
 *
 * Typed callers always pass strings, but histories restored from JSON or
 * session stores can carry numbers, nulls or structured payloads.
 */
export function contentToText(content: unknown): string {
    if (typeof content === 'string') {
        return content;
    }
    if (content === null || content === undefined) {
        return '';
    }
    if (typeof content === 'object') {
        try {
            const json = JSON.stringify(content);
            if (json !== undefined) {
                return json;
            }
        } catch {
            // Circular or otherwise unserializable: use the default string form
        }
    }
    return String(content);
}
