#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { getConfig, type ObserverConfig } from '../config.js';
import { formatManifestRow, MANIFEST_HEADERS, saveManifest } from '../manifest.js';
import { pathKind, prepareTeamData, type ImageTools } from '../prepare.js';
import { assignTeamTags, loadRoster } from '../roster.js';
import { zipDirectory } from '../utils/zip.js';

const LOG_PREFIX = '[generate]';
const SLOTS_FILE = 'Slots.txt';
const MANIFEST_FILE = 'TeamInfo.csv';
const OBSERVER_DIR = 'Observer';

export interface GenerateDeps {
  config?: ObserverConfig;
  tools?: ImageTools;
}

export interface GenerateResult {
  exitCode: number;
  generatedDir?: string;
  zipPath?: string;
}

function printUsage(): void {
  console.error(`${LOG_PREFIX} Invalid arguments`);
  console.error('Usage: observer-gen <league_name> <season> <division>');
  console.error('Example: observer-gen league_name s15 div4');
}

export async function runGenerate(args: string[], deps: GenerateDeps = {}): Promise<GenerateResult> {
  if (args.length !== 3) {
    printUsage();
    return { exitCode: 1 };
  }

  const [leagueName, season, division] = args;
  const config = deps.config ?? getConfig();

  const observerDir = join(config.contentDir, leagueName, season, division);
  if ((await pathKind(observerDir)) !== 'dir') {
    console.error(`${LOG_PREFIX} Directory not found: ${observerDir}`);
    console.error(`Organize images as: ${join(config.contentDir, '<league_name>', '<season>', '<division>')}/`);
    return { exitCode: 1 };
  }

  const slotsFile = join(observerDir, SLOTS_FILE);
  if ((await pathKind(slotsFile)) !== 'file') {
    console.error(`${LOG_PREFIX} File not found: ${slotsFile}`);
    return { exitCode: 1 };
  }

  const outputBaseName = `${leagueName}-${season}-${division}`;
  const generatedDir = join(config.contentDir, 'generated', outputBaseName);
  const observerOutputDir = join(generatedDir, OBSERVER_DIR);
  await mkdir(observerOutputDir, { recursive: true });

  const teams = assignTeamTags(await loadRoster(slotsFile));
  console.log(`${LOG_PREFIX} Loaded roster`, { teams: teams.length, slotsFile });

  const rows = await prepareTeamData(observerDir, teams, observerOutputDir, {
    badge: { fontFamily: config.slotFontFamily, fontSize: config.slotFontSize },
    tools: deps.tools,
  });

  console.log('\nPrepared data for CSV:');
  console.log(MANIFEST_HEADERS.join(', '));
  console.log('-'.repeat(70));
  for (const row of rows) {
    console.log(formatManifestRow(row, { color: config.colorSummary }));
  }

  await saveManifest(join(observerOutputDir, MANIFEST_FILE), rows);

  const zipPath = join(generatedDir, `${outputBaseName}.zip`);
  const fileCount = await zipDirectory(observerOutputDir, zipPath);

  console.log(`\n${LOG_PREFIX} Generated files in: ${generatedDir}`);
  console.log(`${LOG_PREFIX} Zip archive created: ${zipPath}`, { files: fileCount });

  return { exitCode: 0, generatedDir, zipPath };
}

const entryPoint = process.argv[1];
if (entryPoint && import.meta.url === pathToFileURL(realpathSync(entryPoint)).href) {
  runGenerate(process.argv.slice(2))
    .then((result) => {
      process.exitCode = result.exitCode;
    })
    .catch((error) => {
      console.error(`${LOG_PREFIX} Fatal error`, error);
      process.exitCode = 1;
    });
}
