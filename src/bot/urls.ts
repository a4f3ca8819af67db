/**
 * Link extraction and validation for incoming messages.
 */

const URL_PATTERN = /https?:\/\/[^\s<>"']+/i;

/**
 * Find the first http(s) link in a message. Trailing punctuation is dropped.
 * Pure function.
 */
export function extractUrl(text: string): string | null {
  const match = URL_PATTERN.exec(text);
  if (!match) return null;
  return match[0].replace(/[.,;:!?)\]]+$/, "");
}

/**
 * Check scheme and host against the allow-list.
 * A host matches an allowed domain exactly or as a subdomain of it.
 * Pure function.
 */
export function isSupportedUrl(url: string, allowedHosts: readonly string[]): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") return false;

  const host = parsed.hostname.toLowerCase().replace(/\.$/, "");
  return allowedHosts.some((allowed) => {
    const domain = allowed.toLowerCase();
    return host === domain || host.endsWith(`.${domain}`);
  });
}
