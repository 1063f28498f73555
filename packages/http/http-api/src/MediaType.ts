/**
 * Media types the framework produces and matches on.
 */
export const MediaType = {
    TEXT_PLAIN: 'text/plain',
    APPLICATION_JSON: 'application/json',
} as const;

/**
 * True for text/* media types, ignoring parameters such as charset.
 */
export function isTextMediaType(contentType: string | undefined): boolean {
    if (!contentType) {
        return false;
    }
    return contentType.split(';')[0].trim().toLowerCase().startsWith('text/');
}

/**
 * True for application/json and +json media types, ignoring parameters.
 */
export function isJsonMediaType(contentType: string | undefined): boolean {
    if (!contentType) {
        return false;
    }
    const base = contentType.split(';')[0].trim().toLowerCase();
    return base === MediaType.APPLICATION_JSON || base.endsWith('+json');
}
