// src/names.ts
const MAX_NAME_LENGTH = 100;

/**
 * Normalizes a scraped track name for titles, file names and descriptions.
 * Everything that renders a track name goes through here so that the
 * preview and the real upload never disagree.
 */
export function sanitizeTrackName(raw: string | undefined | null, trackNumber: number): string {
    const decoded = String(raw ?? "")
        .replace(/<[^>]+>/g, "")
        .replace(/&gt;/g, ">")
        .replace(/&lt;/g, "<")
        .replace(/&amp;/g, "&")
        .trim();

    let name = collapseWhitespace(decoded);

    // multi-line names are usually a title followed by set notes
    if (name.length > MAX_NAME_LENGTH || decoded.includes("\n")) {
        name = collapseWhitespace(decoded.split("\n")[0]);
    }

    return name || `Track ${trackNumber}`;
}

function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, " ").trim();
}
