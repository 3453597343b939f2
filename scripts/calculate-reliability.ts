import { readFileSync } from 'fs';
import { extname } from 'path';
import { pathToFileURL } from 'url';
import { getDatabase, closeDatabase } from '../src/db/database.js';
import { applyMigrations } from '../src/db/migrations.js';
import { DatabaseProjectStore } from '../src/db/project-store.js';
import { ReliabilityProcessor } from '../src/processors/reliability.processor.js';
import type { ImportSource } from '../src/processors/import.processor.js';
import type { ImportFormat, ReliabilityMethod } from '../src/types/reliability.types.js';
import { interpretAlpha } from '../src/utils/agreement-calculator.js';

const METHODS: readonly ReliabilityMethod[] = [
  'percent_agreement',
  'holsti',
  'scotts_pi',
  'cohens_kappa',
  'krippendorff_alpha',
];

function parseMethods(arg: string | undefined): ReliabilityMethod[] | undefined {
  if (!arg) return undefined;
  const requested = arg.split(',').map(m => m.trim());
  return METHODS.filter(method => requested.includes(method));
}

function formatOf(file: string): ImportFormat {
  const extension = extname(file).toLowerCase();
  if (extension === '.json') return 'json';
  if (extension === '.xlsx') return 'xlsx';
  return 'csv';
}

function readSource(file: string, format: ImportFormat): ImportSource {
  if (format !== 'xlsx') return readFileSync(file, 'utf-8');
  const bytes = readFileSync(file);
  const data = new ArrayBuffer(bytes.length);
  new Uint8Array(data).set(bytes);
  return data;
}

// Usage: tsx scripts/calculate-reliability.ts <project> <file.csv|file.json|file.xlsx> [methods]
async function calculateReliability() {
  const [project, file, methodsArg] = process.argv.slice(2);
  if (!project || !file) {
    console.error('Usage: calculate-reliability <project> <file.csv|file.json|file.xlsx> [method,method]');
    process.exitCode = 1;
    return;
  }

  const db = getDatabase();

  try {
    await applyMigrations(db);
    const processor = new ReliabilityProcessor(new DatabaseProjectStore(db));

    const format = formatOf(file);
    const imported = await processor.importDataset(project, readSource(file, format), format);
    if (!imported.ok) {
      process.exitCode = 1;
      return;
    }

    const report = await processor.calculate(project, { methods: parseMethods(methodsArg) });
    if (!report.ok) {
      process.exitCode = 1;
      return;
    }

    console.log(`\n📊 Reliability for ${project} (${report.value.usedContentIds.length} items, ${report.value.observationCount} observations)`);
    for (const [method, value] of Object.entries(report.value.results)) {
      if (value !== undefined) console.log(`   ${method}: ${value.toFixed(3)}`);
    }
    const alpha = report.value.results.krippendorff_alpha;
    if (alpha !== undefined) {
      console.log(`   → alpha is ${interpretAlpha(alpha)}`);
    }
  } catch (error) {
    console.error('❌ Reliability calculation failed:', error);
    process.exitCode = 1;
  } finally {
    await closeDatabase();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void calculateReliability();
}
