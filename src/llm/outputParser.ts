/**
 * Utilities for pulling Turtle out of chat model answers.
 */

const FENCE = /```[ \t]*(turtle|ttl|rdf|owl|n3|sparql)?[^\n]*\n([\s\S]*?)```/gi;

/**
 * Extract the Turtle document from a model answer.
 *
 * Prefers a fenced block tagged turtle/ttl, then the longest fenced block,
 * then the text from the first `@prefix`/`PREFIX` line, then the whole answer.
 */
export function extractTurtle(rawOutput: string): string {
    const blocks: Array<{ tag: string; body: string }> = [];
    for (const match of rawOutput.matchAll(FENCE)) {
        blocks.push({ tag: (match[1] ?? '').toLowerCase(), body: match[2] });
    }

    const tagged = blocks.find((b) => b.tag === 'turtle' || b.tag === 'ttl');
    if (tagged) return tagged.body.trim();

    if (blocks.length > 0) {
        return blocks.reduce((a, b) => (b.body.length > a.body.length ? b : a)).body.trim();
    }

    const prefixAt = rawOutput.search(/^\s*(@prefix|PREFIX)\s/m);
    if (prefixAt >= 0) return rawOutput.slice(prefixAt).trim();

    return rawOutput.trim();
}
