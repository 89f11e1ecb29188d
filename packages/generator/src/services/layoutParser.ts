// ============================================================================
// Layout Parser - Splits raw model output into layout descriptions
// ============================================================================

export const LAYOUT_MARKER = 'LAYOUT';

const MAX_TITLE_LENGTH = 80;
const TITLE_LABEL = /^(?:\d+\.\s*)?(?:\*\*)?title(?:\*\*)?\s*:\s*(?:\*\*)?/i;
const MARKDOWN_HEADING = /^#{1,6}\s+/;
const BOLD_LINE = /^\*\*(.+)\*\*$/;

/**
 * Never fails on malformed marker text; it degrades to one layout holding the
 * whole response. Blank input yields an empty list.
 */
export function parseLayouts(rawText: string): string[] {
    const trimmed = rawText.trim();
    if (!trimmed) return [];

    const layouts = rawText
        .split(LAYOUT_MARKER)
        .slice(1)
        .map((segment) => {
            const text = segment.trim();
            const colon = text.indexOf(':');
            return (colon >= 0 ? text.slice(colon + 1) : text).trim();
        })
        .filter((layout) => layout.length > 0);

    return layouts.length > 0 ? layouts : [trimmed];
}

function extractHeading(line: string): string | null {
    const text = line.trim();
    let heading: string;

    const label = text.match(TITLE_LABEL);
    const bold = text.match(BOLD_LINE);
    if (label) {
        heading = text.slice(label[0].length);
    } else if (MARKDOWN_HEADING.test(text)) {
        heading = text.replace(MARKDOWN_HEADING, '');
    } else if (bold) {
        heading = bold[1];
    } else {
        return null;
    }

    const cleaned = heading
        .replace(/\*\*/g, '')
        .replace(/^["']+|["']+$/g, '')
        .trim();
    if (!cleaned || cleaned.length > MAX_TITLE_LENGTH) return null;
    return cleaned;
}

export function deriveLayoutTitle(description: string, index: number): string {
    const firstLine = description.split('\n', 1)[0] ?? '';
    return extractHeading(firstLine) ?? `Layout ${index + 1}`;
}
