#!/usr/bin/env node
import 'dotenv/config';
import { readFileSync, writeFileSync } from 'fs';
import chalk from 'chalk';
import ora from 'ora';
import boxen from 'boxen';
import { loadConfig } from './config.js';
import { createContainer, createLLMProvider } from './container.js';
import { convertUml } from './pipeline.js';
import { loadXmi } from './xmi/index.js';
import { parseTurtle } from './serializer/index.js';
import { OntologyGenerator } from './llm/generator.js';
import { JsonBenchmarkStore, formatMetrics, formatSummaryTable } from './benchmark/index.js';
import { summarizeModel } from './utils/response.js';
import { PipelineException } from './types/index.js';
import { CliArgs, parseCliArgs, toConvertOptions } from './cliArgs.js';
import { generateWithSpinner } from './cliGenerate.js';
import { VERSION } from './version.js';

const HELP = `
uml2owl CLI v${VERSION}

Usage:
  uml2owl convert <file.xmi>      Convert a UML class diagram to OWL
  uml2owl inspect <file.xmi>      Show what was recognised in the XMI
  uml2owl validate <file.ttl>     Parse Turtle and count OWL entities
  uml2owl generate <file.xmi>     Ask a language model for the ontology
  uml2owl benchmarks [file.json]  Show recorded generation benchmarks

Options:
  --format=<fmt>       turtle (default), ntriples, functional
  --base=<iri>         Namespace for generated IRIs
  --out=<file>         Write the ontology to a file instead of stdout
  --strict             Fail on dangling references and invalid multiplicities
  --disjoint=<policy>  Disjoint subclasses: abstract (default), all, none
  --naming=<mode>      Property names: shared (default), qualified
  --qualified          Qualified cardinality restrictions (owl:onClass)
  --no-labels          Omit rdfs:label annotations
  --model=<name>       Model for generate (overrides OLLAMA_MODEL / OPENAI_MODEL)
  --benchmark=<file>   Append generate metrics to this JSON file
  --summary            Per-model aggregates for benchmarks
  --help, -h           Show this help
  --version, -v        Show version

Examples:
  uml2owl convert shop.xmi --format=functional
  uml2owl convert shop.xmi --base=http://example.org/shop# --out=shop.ttl
  uml2owl generate shop.xmi --model=llama3.1:8b --benchmark=benchmark_results.json
`;

function emit(text: string, out?: string): void {
    if (out) {
        writeFileSync(out, text);
        console.error(chalk.green(`✓ Written to ${out}`));
    } else {
        process.stdout.write(text.endsWith('\n') ? text : text + '\n');
    }
}

async function runConvert(args: CliArgs, file: string): Promise<number> {
    const config = loadConfig();
    const result = await convertUml(readFileSync(file, 'utf-8'), toConvertOptions(args, config.baseIri));

    for (const w of result.report.warnings) console.error(chalk.yellow(`⚠ ${w}`));
    for (const s of result.report.skipped) console.error(chalk.dim(`- skipped ${s.kind} ${s.name}: ${s.reason}`));

    emit(result.output, args.out);
    const { loadMs, mapMs, serializeMs } = result.timings;
    console.error(chalk.dim(
        `${result.ontology.axioms.length} axioms from ${result.model.classes.length} classes ` +
        `(load ${loadMs}ms, map ${mapMs}ms, serialize ${serializeMs}ms)`
    ));
    return 0;
}

function runInspect(args: CliArgs, file: string): number {
    const summary = summarizeModel(loadXmi(readFileSync(file, 'utf-8'), { strict: args.strict }));

    console.log(chalk.bold(`Model: ${summary.name}`));
    if (summary.packages.length > 0) console.log(`Packages: ${summary.packages.join(', ')}`);
    console.log(chalk.bold(`\nClasses (${summary.classes.length})`));
    for (const c of summary.classes) {
        const flags = [c.kind !== 'class' ? c.kind : '', c.isAbstract ? 'abstract' : ''].filter(Boolean);
        console.log(`  ${c.name}${flags.length ? chalk.dim(` [${flags.join(', ')}]`) : ''} ${chalk.dim(`${c.attributes} attributes`)}`);
    }
    if (summary.enumerations.length > 0) {
        console.log(chalk.bold(`\nEnumerations (${summary.enumerations.length})`));
        for (const e of summary.enumerations) console.log(`  ${e.name} { ${e.literals.join(', ')} }`);
    }
    if (summary.associations.length > 0) {
        console.log(chalk.bold(`\nAssociations (${summary.associations.length})`));
        for (const a of summary.associations) console.log(`  ${a.name ?? a.id}: ${a.ends.join(', ')}`);
    }
    console.log(chalk.dim(`\n${summary.generalizations} generalizations`));
    for (const w of summary.warnings) console.error(chalk.yellow(`⚠ ${w}`));
    return 0;
}

function runValidate(file: string): number {
    const result = parseTurtle(readFileSync(file, 'utf-8'));
    if (!result.valid) {
        console.log(chalk.red(`✗ Invalid Turtle: ${result.error ?? 'unknown error'}`));
        return 1;
    }
    console.log(chalk.green(`✓ ${result.tripleCount} triples`));
    console.log(`  Classes: ${result.classes}`);
    console.log(`  Object properties: ${result.objectProperties}`);
    console.log(`  Datatype properties: ${result.dataProperties}`);
    console.log(`  Individuals: ${result.individuals}`);
    return 0;
}

async function runGenerate(args: CliArgs, file: string): Promise<number> {
    const config = loadConfig();
    const llm = args.model ? { ...config.llm, model: args.model } : config.llm;
    const generator = new OntologyGenerator(createLLMProvider({ ...config, llm }));

    const uml = readFileSync(file, 'utf-8');
    console.error(chalk.dim(`Loaded ${uml.length} characters from ${file}`));

    const spinner = ora(`Generating ontology with ${generator.model}...`);
    const result = await generateWithSpinner(spinner, generator, uml);

    if (result.metrics) {
        console.error(boxen(formatMetrics(result.metrics), { padding: 1, title: 'BENCHMARK RESULTS' }));
        if (args.benchmark) {
            const store = new JsonBenchmarkStore(args.benchmark);
            await store.append(result.metrics);
            console.error(chalk.green(`✓ Benchmark results saved to ${store.path}`));
        }
    }
    for (const e of result.errors ?? []) console.error(chalk.yellow(`⚠ ${e}`));

    if (!result.ontology) {
        console.error(chalk.red('No ontology generated'));
        return 1;
    }
    emit(result.ontology, args.out);
    return result.metrics?.success === false ? 1 : 0;
}

async function runBenchmarks(args: CliArgs, file?: string): Promise<number> {
    const store = file
        ? new JsonBenchmarkStore(file)
        : createContainer().benchmarkStore;

    if (args.summary) {
        console.log(formatSummaryTable(await store.summarize()));
        return 0;
    }
    const runs = await store.list(args.model);
    if (runs.length === 0) {
        console.log('No benchmark runs recorded.');
        return 0;
    }
    for (const run of runs) {
        console.log(formatMetrics(run));
        console.log('');
    }
    return 0;
}

async function main(): Promise<number> {
    const args = parseCliArgs(process.argv.slice(2));

    if (args.version) {
        console.log(VERSION);
        return 0;
    }
    if (args.help || !args.command) {
        console.log(HELP);
        return 0;
    }

    if (args.command === 'benchmarks') {
        return runBenchmarks(args, args.file);
    }

    if (!args.file) {
        console.error(chalk.red('Error: file argument required'));
        return 1;
    }

    switch (args.command) {
        case 'convert':
            return runConvert(args, args.file);
        case 'inspect':
            return runInspect(args, args.file);
        case 'validate':
            return runValidate(args.file);
        case 'generate':
            return runGenerate(args, args.file);
        default:
            console.error(chalk.red(`Unknown command: ${args.command}`));
            console.log(HELP);
            return 1;
    }
}

main()
    .then((code) => process.exit(code))
    .catch((e: unknown) => {
        if (e instanceof PipelineException) {
            const { code, message, suggestion } = e.error;
            console.error(chalk.red(`Error [${code}]: ${message}`));
            if (suggestion) console.error(chalk.dim(`Suggestion: ${suggestion}`));
        } else {
            console.error(chalk.red('Error:'), e instanceof Error ? e.message : String(e));
        }
        process.exit(1);
    });
