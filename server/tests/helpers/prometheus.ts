/**
 * Minimal parser for the Prometheus text format, enough to assert on samples.
 */

export interface Sample {
    name: string;
    labels: Record<string, string>;
    value: number;
}

const SAMPLE_LINE = /^([a-zA-Z_:][a-zA-Z0-9_:]*)(?:\{(.*)\})?\s+(\S+)$/;
const LABEL_PAIR = /([a-zA-Z_][a-zA-Z0-9_]*)="((?:[^"\\]|\\.)*)"/g;

export function parseSamples(text: string): Sample[] {
    const samples: Sample[] = [];

    for (const line of text.split('\n')) {
        if (line === '' || line.startsWith('#')) continue;
        const match = SAMPLE_LINE.exec(line);
        if (!match) continue;

        const labels: Record<string, string> = {};
        for (const pair of (match[2] ?? '').matchAll(LABEL_PAIR)) {
            labels[pair[1]] = pair[2];
        }
        samples.push({ name: match[1], labels, value: Number(match[3]) });
    }

    return samples;
}

function sameLabels(a: Record<string, string>, b: Record<string, string>): boolean {
    const keys = Object.keys(a);
    return keys.length === Object.keys(b).length && keys.every((key) => a[key] === b[key]);
}

export function sampleValue(text: string, name: string, labels: Record<string, string> = {}): number | undefined {
    return parseSamples(text).find((s) => s.name === name && sameLabels(s.labels, labels))?.value;
}

export function sumSamples(text: string, name: string): number {
    return parseSamples(text)
        .filter((s) => s.name === name)
        .reduce((total, s) => total + s.value, 0);
}

/**
 * Bucket samples for one label set, in exposition order.
 */
export function bucketsFor(text: string, name: string, labels: Record<string, string>): Array<{ le: string; value: number }> {
    return parseSamples(text)
        .filter((s) => s.name === `${name}_bucket`)
        .filter((s) => {
            const { le: _le, ...rest } = s.labels;
            return sameLabels(rest, labels);
        })
        .map((s) => ({ le: s.labels.le, value: s.value }));
}
