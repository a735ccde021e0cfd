import type { GenerateResult } from './types/index.js';
import type { OntologyGenerator } from './llm/generator.js';

/** The part of an ora spinner that generation drives */
export interface Spinner {
    start(): unknown;
    succeed(text?: string): unknown;
    fail(text?: string): unknown;
}

/**
 * Run a benchmarked generation behind a spinner. The spinner is always
 * stopped, also when generation throws (empty input, storage errors).
 */
export async function generateWithSpinner(
    spinner: Spinner,
    generator: Pick<OntologyGenerator, 'generate'>,
    uml: string
): Promise<GenerateResult> {
    spinner.start();
    let result: GenerateResult;
    try {
        result = await generator.generate(uml, { benchmark: true });
    } catch (e) {
        spinner.fail('Generation failed');
        throw e;
    }
    if (result.metrics?.success) spinner.succeed('Generation finished');
    else spinner.fail('Generation failed');
    return result;
}
