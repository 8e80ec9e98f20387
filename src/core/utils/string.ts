const SUPPORTED_PROTOCOLS = ['http:', 'https:', 'file:'];

/**
 * Checks if a string is an absolute `http:`, `https:` or `file:` URL.
 * Anything else, including Windows drive paths such as `C:\\spec.json`, is treated as a file path.
 */
export function isUrl(input: string): boolean {
    try {
        return SUPPORTED_PROTOCOLS.includes(new URL(input).protocol);
    } catch {
        return false;
    }
}
