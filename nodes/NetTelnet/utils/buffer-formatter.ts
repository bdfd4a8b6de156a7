// Applied one after another, so "\r\n\r" collapses to a single break
const LINE_BREAKS = [/\n\r/g, /\r\n/g, /\r/g];

export function normalizeLineEndings(text: string): string {
    return LINE_BREAKS.reduce((result, pattern) => result.replace(pattern, '\n'), text);
}

/**
 * Turns a settled command buffer into the output handed back to callers.
 * With `stripPrompt` the last line, normally the prompt that ended the wait, is dropped.
 */
export function formatBuffer(buffer: string, stripPrompt: boolean): string {
    let output = normalizeLineEndings(buffer);
    if (stripPrompt) {
        const lines = output.split('\n');
        lines.pop();
        output = lines.join('\n');
    }
    return output.trim();
}
