#!/usr/bin/env node
/**
 * uml2owl MCP server - Entry Point
 */

import { runServer } from './server.js';
import { VERSION } from './version.js';

async function main(): Promise<void> {
    const args = process.argv.slice(2);

    if (args.includes('--help') || args.includes('-h')) {
        console.log(`
uml2owl MCP Server - UML class diagrams to OWL ontologies

Usage: uml2owl-mcp [options]

Options:
  --help, -h     Show this help message
  --version, -v  Show version information

Tools:
  - convert-uml        Convert XMI to Turtle, N-Triples or OWL functional syntax
  - inspect-uml        List what was recognised in an XMI document
  - map-uml            OWL axioms as JSON with per-element trace
  - validate-ontology  Parse Turtle and count classes and properties
  - generate-ontology  Ask a language model for an ontology (with benchmarks)
  - list-benchmarks    Recorded generation benchmarks

MCP Capabilities:
  - Resources: Mapping rules, datatype table, output formats
  - Prompts: uml-to-owl, review-ontology

Environment:
  UML2OWL_BASE_IRI, UML2OWL_BENCHMARK_FILE,
  OLLAMA_URL, OLLAMA_MODEL, OPENAI_BASE_URL, OPENAI_API_KEY, OPENAI_MODEL, LLM_PROVIDER

The server communicates via stdio using the Model Context Protocol.
`);
        process.exit(0);
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log(`uml2owl version ${VERSION}`);
        process.exit(0);
    }

    try {
        await runServer();
    } catch (error) {
        console.error('Failed to start server:', error);
        process.exit(1);
    }
}

main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
});
