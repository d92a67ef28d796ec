export function indent(text: string, indent: number): string {
    return text.split('\n').map(line => ' '.repeat(indent) + line).join('\n');
}

export function capitalize(text: string): string {
    return text.charAt(0).toUpperCase() + text.slice(1);
}

/** Indents captured stream text for a report, dropping the final line break. */
export function formatStream(text: string, depth: number): string {
    const trimmed = text.endsWith('\n') ? text.slice(0, -1) : text;
    if (trimmed.length === 0) {
        return indent("(empty)", depth);
    }
    return indent(trimmed, depth);
}

export function describeError(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
