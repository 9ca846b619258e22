#!/usr/bin/env node

import path from 'path';
import { Command } from 'commander';
import { RepoAnalyzer } from '../analyzer/RepoAnalyzer';
import { ConfigLoader, toAnalyzeOptions } from '../config/ConfigLoader';
import { AnalyzerConfig } from '../config/schema';
import { InvalidRepositoryPathError } from '../models/RepoAnalysis';
import { ReportGenerator } from '../reporter/ReportGenerator';
import { EnvLoader } from '../utils/EnvLoader';
import logger from '../utils/logger';
import { printStartupDiagnostics } from './diagnostics';

export interface AnalyzeCliOptions {
    config?: string;
    json?: boolean;
    output?: string;
    history?: boolean;
    deadline?: string;
    verbose?: boolean;
}

const program = new Command();

program
    .name('repolens')
    .description('Structural fingerprint of a local source repository')
    .version('0.1.0');

program
    .command('analyze')
    .description('Analyze a local repository and print a summary')
    .argument('[target]', 'Repository path', '.')
    .option('-c, --config <path>', 'Custom config file')
    .option('--json', 'Print the full analysis as JSON')
    .option('-o, --output <file>', 'Also write the JSON analysis to a file')
    .option('--no-history', 'Skip git history extraction')
    .option('--deadline <ms>', 'Bound the whole analysis in milliseconds')
    .option('-v, --verbose', 'Verbose output')
    .action(analyzeAction);

async function analyzeAction(target: string, options: AnalyzeCliOptions): Promise<void> {
    try {
        const env = new EnvLoader().load();
        if (options.verbose) {
            logger.level = 'debug';
        }

        const configLoader = new ConfigLoader();
        const config = applyCliOptions(await configLoader.load(options.config), options);
        if (options.verbose) {
            printStartupDiagnostics(config, configLoader.getDiagnostics(), env);
        }

        const analysis = await new RepoAnalyzer(target, toAnalyzeOptions(config)).analyze();
        const reportGenerator = new ReportGenerator();

        if (options.output) {
            await reportGenerator.writeJSON(analysis, path.resolve(options.output));
        }

        console.log(options.json ? reportGenerator.toJSON(analysis) : reportGenerator.summarizeForPrompt(analysis));

        for (const issue of analysis.diagnostics) {
            logger.warn(`[${issue.stage}] ${issue.kind}: ${issue.message}${issue.source ? ` (${issue.source})` : ''}`);
        }
    } catch (error) {
        if (!(error instanceof InvalidRepositoryPathError)) {
            logger.error(`Analysis failed: ${error}`);
        }
        console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
    }
}

/**
 * Apply CLI options to config
 */
function applyCliOptions(config: AnalyzerConfig, options: AnalyzeCliOptions): AnalyzerConfig {
    if (options.history === false) {
        config.history.enabled = false;
    }
    if (options.deadline !== undefined) {
        const deadline = parseInt(options.deadline, 10);
        if (!Number.isInteger(deadline) || deadline <= 0) {
            throw new Error(`Invalid deadline: ${options.deadline}`);
        }
        config.analysis.deadline_ms = deadline;
    }
    return config;
}

// Only parse arguments if this module is run directly
if (require.main === module) {
    program.parse();
}

export { program, applyCliOptions, analyzeAction };
