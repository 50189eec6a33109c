#!/usr/bin/env node

import 'dotenv/config';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { Command } from 'commander';
import { z } from 'zod';
import { getEnv } from '../config/env.js';
import { PreviewError } from '../errors/index.js';
import { RecordStatusEnum } from '../types/enums.js';
import { NunjucksPreviewTemplate } from '../services/template.renderer.js';
import { createPreviewPipeline } from '../preview-pipeline.factory.js';
import { parseCliOptions, toPipelineConfig, toStorageOptions } from './options.js';

const pkg = z
    .object({ version: z.string() })
    .parse(JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')));

const BUNDLED_TEMPLATE = fileURLToPath(new URL('../../templates/viewer_template.html', import.meta.url));

const program = new Command();

program
    .name('docpreview')
    .description('Render annotated JSONL documents into self-contained HTML previews')
    .version(pkg.version)
    .argument('<jsonl_path>', 'JSONL input, local path or s3://bucket/key (.gz allowed)')
    .option('--output_dir <dir>', 'Directory for the HTML previews', 'dolma_previews')
    .option('--template_path <path>', 'Viewer template', BUNDLED_TEMPLATE)
    .option('--on_error <policy>', 'Failure policy: abort | continue', 'continue')
    .option('--span_policy <policy>', 'Out-of-range span offsets: clamp | reject', 'clamp')
    .option('--concurrency <n>', 'Records processed at once (default: available parallelism)')
    .option('--task_timeout_ms <ms>', 'Time budget per record')
    .option('--link_ttl_seconds <s>', 'Presigned link expiry, below 604800')
    .option('--profile <name>', 'AWS profile for S3 access and link signing')
    .action(async (jsonlPath: string, rawOptions: Record<string, unknown>) => {
        const env = getEnv();
        const options = parseCliOptions(rawOptions);
        const template = await NunjucksPreviewTemplate.load(options.template_path ?? BUNDLED_TEMPLATE);

        const pipeline = createPreviewPipeline(
            toPipelineConfig(options, env, process.stderr.isTTY === true),
            { template, storageOptions: toStorageOptions(options, env) }
        );

        pipeline.on('record:complete', (result) => {
            console.log(`[${result.progress.completed}/${result.progress.dispatched}] OK ${result.id} -> ${result.outputPath}`);
        });
        pipeline.on('record:failed', (result) => {
            console.log(`[${result.progress.completed}/${result.progress.dispatched}] FAILED line ${result.lineNumber}: ${result.error.message}`);
        });

        const report = await pipeline.run(jsonlPath);

        console.log();
        console.log(`Succeeded: ${report.succeeded}`);
        console.log(`Failed:    ${report.failed}`);
        if (report.skipped > 0) {
            console.log(`Skipped:   ${report.skipped}`);
        }
        if (report.aborted) {
            console.log('Run aborted after the first failure.');
        }

        const failures = report.results.filter(result => result.status === RecordStatusEnum.FAILED);
        if (failures.length > 0) {
            console.log('\nFailed records:');
            for (const failure of failures) {
                console.log(`  line ${failure.lineNumber} ${failure.id ?? '(no id)'}: [${failure.error.code}] ${failure.error.message}`);
            }
        }

        process.exitCode = report.failed > 0 || report.aborted ? 1 : 0;
    });

program.parseAsync(process.argv).catch((error: unknown) => {
    if (error instanceof PreviewError) {
        console.error(`Error [${error.code}]: ${error.message}`);
    } else {
        console.error('Error:', error instanceof Error ? error.message : String(error));
    }
    process.exit(1);
});
