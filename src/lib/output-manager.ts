/**
 * Output packaging: one directory per run under the configured output
 * directory, holding per-app JSON files, reports and a human-readable summary.
 */

import type { Dirent } from 'node:fs';
import { mkdir, readdir, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { dataKeyFor } from './apps.js';
import { configToJSON } from './config.js';
import type { GenerationConfig } from './config.js';
import logger from './logger.js';
import type { Logger } from './logger.js';
import type {
  AnalysisRecord,
  AppPayload,
  ReflectionResult,
  UserProfile,
  ValidationResult,
} from '../agents/types.js';

export const OUTPUT_DIR_PREFIX = 'user_profile_';
const GENERATOR_VERSION = '0.1.0';

export interface OutputBundle {
  generated_data: Record<string, AppPayload>;
  validation_results: Record<string, ValidationResult>;
  reflection_results: ReflectionResult | null;
  user_profile: UserProfile;
  events: string[];
  analysis: AnalysisRecord | null;
}

export interface OutputPackager {
  /** Persists a run and returns the directory it was written to. */
  save(bundle: OutputBundle): Promise<string>;
}

export type OutputSize =
  | {
      total_size_bytes: number;
      total_size_mb: number;
      file_count: number;
      file_sizes: Record<string, number>;
    }
  | { error: string };

export interface FileOutputPackagerOptions {
  now?: () => Date;
  logger?: Logger;
}

/** `20240131_093005`, in UTC. */
export function formatRunTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
}

function titleCase(value: string): string {
  return value
    .replace(/_/g, ' ')
    .split(' ')
    .map((word) => (word ? word[0].toUpperCase() + word.slice(1).toLowerCase() : word))
    .join(' ');
}

function formatProfileValue(value: unknown): string {
  if (Array.isArray(value)) return value.map(String).join(', ');
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}

function recordCount(appName: string, payload: AppPayload): number {
  return payload[dataKeyFor(appName)]?.length ?? 0;
}

async function writeJson(filePath: string, value: unknown): Promise<void> {
  await writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
}

export class FileOutputPackager implements OutputPackager {
  private readonly config: GenerationConfig;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(config: GenerationConfig, options: FileOutputPackagerOptions = {}) {
    this.config = config;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? logger;
  }

  async save(bundle: OutputBundle): Promise<string> {
    const generatedAt = this.now();
    const outputPath = await this.createRunDirectory(generatedAt);
    const profileId = path.basename(outputPath);
    this.log.info({ outputPath }, 'Saving generated data');

    const written: string[] = [];
    for (const [appName, payload] of Object.entries(bundle.generated_data)) {
      if (Object.keys(payload).length === 0) continue;
      await writeJson(path.join(outputPath, `${appName}.json`), payload);
      written.push(appName);
    }

    if (this.config.include_metadata) {
      await writeJson(path.join(outputPath, 'metadata.json'), {
        generation_info: {
          timestamp: generatedAt.toISOString(),
          config: configToJSON(this.config),
          generator_version: GENERATOR_VERSION,
        },
        input_data: {
          user_profile: bundle.user_profile,
          events: bundle.events,
          analysis: bundle.analysis ?? {},
        },
      });
    }

    await writeJson(path.join(outputPath, 'validation_report.json'), bundle.validation_results);
    await writeJson(path.join(outputPath, 'reflection_report.json'), bundle.reflection_results ?? {});

    if (this.config.create_summary_report) {
      await writeFile(path.join(outputPath, 'SUMMARY.md'), this.renderSummary(bundle, generatedAt), 'utf-8');
    }
    await writeFile(path.join(outputPath, 'README.md'), this.renderReadme(profileId, written), 'utf-8');

    this.log.info({ outputPath, files: written.length }, 'Generated data saved');
    return outputPath;
  }

  /** Byte totals for a saved run, including nested files. */
  async getOutputSize(outputPath: string): Promise<OutputSize> {
    try {
      await stat(outputPath);
    } catch {
      return { error: 'Path does not exist' };
    }

    const fileSizes: Record<string, number> = {};
    let total = 0;
    const walk = async (dir: string): Promise<void> => {
      for (const entry of await readdir(dir, { withFileTypes: true })) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(full);
        } else if (entry.isFile()) {
          const { size } = await stat(full);
          fileSizes[entry.name] = size;
          total += size;
        }
      }
    };
    await walk(outputPath);

    return {
      total_size_bytes: total,
      total_size_mb: Math.round((total / 1024 / 1024) * 100) / 100,
      file_count: Object.keys(fileSizes).length,
      file_sizes: fileSizes,
    };
  }

  /**
   * Deletes all but the `keep` most recently created run directories.
   * Returns the removed paths.
   */
  async cleanupOldOutputs(keep = 10): Promise<string[]> {
    const root = this.config.output_directory;
    let entries: Dirent[];
    try {
      entries = await readdir(root, { withFileTypes: true });
    } catch (err) {
      this.log.warn({ root, error: err instanceof Error ? err.message : String(err) }, 'Output directory not readable');
      return [];
    }

    const dirs = await Promise.all(
      entries
        .filter((e) => e.isDirectory() && e.name.startsWith(OUTPUT_DIR_PREFIX))
        .map(async (e) => {
          const full = path.join(root, e.name);
          const info = await stat(full);
          return { path: full, created: info.birthtimeMs || info.ctimeMs };
        }),
    );
    dirs.sort((a, b) => b.created - a.created);

    const stale = dirs.slice(Math.max(0, keep));
    for (const dir of stale) {
      this.log.info({ dir: dir.path }, 'Removing old output directory');
      await rm(dir.path, { recursive: true, force: true });
    }
    this.log.info({ removed: stale.length, keep }, 'Output cleanup completed');
    return stale.map((d) => d.path);
  }

  private async createRunDirectory(generatedAt: Date): Promise<string> {
    const root = this.config.output_directory;
    await mkdir(root, { recursive: true });
    const base = `${OUTPUT_DIR_PREFIX}${formatRunTimestamp(generatedAt)}`;

    // Two runs in the same second get a numeric suffix.
    for (let n = 1; ; n++) {
      const candidate = path.join(root, n === 1 ? base : `${base}_${n}`);
      try {
        await mkdir(candidate);
        return candidate;
      } catch (err) {
        if (!(err instanceof Error && 'code' in err && err.code === 'EEXIST')) throw err;
      }
    }
  }

  private renderSummary(bundle: OutputBundle, generatedAt: Date): string {
    const lines: string[] = ['# Persona Data Generation Summary', ''];
    lines.push(`**Generated:** ${generatedAt.toISOString().slice(0, 19).replace('T', ' ')}`);
    lines.push(
      `**Time Period:** ${this.config.start_date.toISOString().slice(0, 10)} to ${this.config.end_date.toISOString().slice(0, 10)}`,
      '',
    );

    lines.push('## User Profile', '');
    for (const [key, value] of Object.entries(bundle.user_profile)) {
      lines.push(`- **${titleCase(key)}:** ${formatProfileValue(value)}`);
    }
    lines.push('');

    lines.push('## Events', '');
    bundle.events.forEach((event, i) => lines.push(`${i + 1}. ${event}`));
    lines.push('');

    lines.push('## Generated Data Summary', '', '| App | Entries Generated |', '|-----|------------------|');
    for (const [appName, payload] of Object.entries(bundle.generated_data)) {
      if (Object.keys(payload).length === 0) continue;
      lines.push(`| ${titleCase(appName)} | ${recordCount(appName, payload)} |`);
    }
    lines.push('');

    lines.push('## Validation Results', '');
    const results = Object.entries(bundle.validation_results);
    if (results.length > 0) {
      const totalErrors = results.reduce((sum, [, r]) => sum + r.total_errors, 0);
      lines.push(`- **Total Validation Errors:** ${totalErrors}`);
      for (const [appName, r] of results) {
        lines.push(`- **${titleCase(appName)}:** ${r.is_valid ? '✅ Passed' : '❌ Failed'}`);
      }
    }
    lines.push('');

    lines.push('## Quality Assessment', '');
    const reflection = bundle.reflection_results;
    if (reflection) {
      lines.push(`- **Overall Quality:** ${titleCase(reflection.overall_quality)}`);
      lines.push(`- **Realism Score:** ${reflection.realism_score}/10`);
      lines.push(`- **Diversity Score:** ${reflection.diversity_score}/10`);
      lines.push(`- **Coherence Score:** ${reflection.coherence_score}/10`);
      if (reflection.strengths.length > 0) {
        lines.push('', '**Strengths:**', ...reflection.strengths.map((s) => `- ${s}`));
      }
      if (reflection.weaknesses.length > 0) {
        lines.push('', '**Areas for Improvement:**', ...reflection.weaknesses.map((w) => `- ${w}`));
      }
    }

    lines.push('', '---', '*Generated by persona-synth*', '');
    return lines.join('\n');
  }

  private renderReadme(profileId: string, written: string[]): string {
    const lines: string[] = [
      `# ${profileId}`,
      '',
      'This directory contains synthetic phone app data generated by persona-synth.',
      '',
      '## Contents',
      '',
    ];
    for (const app of this.config.enabled_apps) {
      if (written.includes(app)) lines.push(`- \`${app}.json\` - ${titleCase(app)} app data`);
    }
    lines.push(
      '',
      '## Metadata Files',
      '',
      '- `metadata.json` - Generation configuration and input data',
      '- `validation_report.json` - Schema validation results',
      '- `reflection_report.json` - Quality assessment results',
      '- `SUMMARY.md` - Human-readable summary report',
      '',
      '## Data Format',
      '',
      'All data files are JSON and conform to the per-app schemas.',
      'See the validation report for schema compliance details.',
      '',
      '**Note:** This is synthetic data generated for testing purposes only.',
      '',
    );
    return lines.join('\n');
  }
}
