export function tryParseUrl(raw: string): URL | null {
    const trimmed = raw.trim();
    if (!trimmed) return null;
    try {
        return new URL(trimmed);
    } catch {
        return null;
    }
}

export function isLinkedInHost(hostname: string): boolean {
    const host = hostname.toLowerCase();
    return host === 'linkedin.com' || host.endsWith('.linkedin.com');
}

/**
 * Canonical profile URL: https://www.linkedin.com/in/<slug>/ without query or hash.
 * Bare `linkedin.com/in/...` values from vendor exports get a scheme first.
 * Anything that is not a LinkedIn URL is returned trimmed.
 */
export function normalizeLinkedInUrl(raw: string): string {
    const trimmed = raw.trim();
    const withScheme = /^(www\.)?linkedin\.com\//i.test(trimmed) ? `https://${trimmed}` : trimmed;
    const parsed = tryParseUrl(withScheme);
    if (!parsed || !isLinkedInHost(parsed.hostname)) {
        return trimmed;
    }

    const normalized = new URL(parsed.toString());
    normalized.protocol = 'https:';
    normalized.hostname = 'www.linkedin.com';
    normalized.hash = '';

    const parts = normalized.pathname.split('/').filter(Boolean);
    if (parts.length >= 2 && parts[0].toLowerCase() === 'in') {
        normalized.pathname = `/in/${parts[1]}/`;
        normalized.search = '';
    }
    return normalized.toString();
}
