/**
 * Challenge page detection
 *
 * The portal sits behind bot protection that answers with a human-verification page instead
 * of the requested content. Those pages are recognised by a fixed set of markers; solving
 * them is out of reach, so a detected challenge ends the call.
 */

export const CAPTCHA_MARKERS = [
    'captcha',
    'verify you are human',
    'security check',
    'recaptcha',
    'cloudflare',
] as const;

/**
 * Returns the first marker found in the body (case-insensitive), or null
 */
export function findCaptchaMarker(body: string): string | null {
    const content = body.toLowerCase();
    return CAPTCHA_MARKERS.find(marker => content.includes(marker)) ?? null;
}
