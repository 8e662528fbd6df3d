import { mkdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { makeUniqueColor, readLogoColor } from './color.js';
import { addSlotNumber, type SlotBadgeOptions } from './slotBadge.js';
import type { ManifestRow, Rgb, TeamSlot } from './types.js';

const LOG_PREFIX = '[prepare]';
export const TEAM_ICON_DIR = 'TeamIcon';
export const LOGOS_DIR = 'logos';

export interface ImageTools {
  readColor: (imagePath: string) => Promise<Rgb>;
  addSlotNumber: (inputPath: string, slot: string, outputPath: string, options: SlotBadgeOptions) => Promise<void>;
}

export const sharpImageTools: ImageTools = {
  readColor: readLogoColor,
  addSlotNumber,
};

export interface PrepareOptions {
  badge: SlotBadgeOptions;
  tools?: ImageTools;
}

export async function pathKind(path: string): Promise<'file' | 'dir' | null> {
  const info = await stat(path).catch(() => null);
  if (!info) return null;
  if (info.isDirectory()) return 'dir';
  return info.isFile() ? 'file' : null;
}

/** Clean logo for a team: `logos/` first, then the existing `TeamIcon/` folder. */
export async function findLogo(observerDir: string, imageFileName: string): Promise<string | null> {
  for (const folder of [LOGOS_DIR, TEAM_ICON_DIR]) {
    const candidate = join(observerDir, folder, imageFileName);
    if ((await pathKind(candidate)) === 'file') {
      return candidate;
    }
  }
  return null;
}

export async function prepareTeamData(
  observerDir: string,
  teams: TeamSlot[],
  outputDir: string,
  options: PrepareOptions,
): Promise<ManifestRow[]> {
  const tools = options.tools ?? sharpImageTools;
  const iconDir = join(outputDir, TEAM_ICON_DIR);
  await mkdir(iconDir, { recursive: true });

  const usedColors = new Set<string>();
  const rows: ManifestRow[] = [];

  for (const team of teams) {
    const logoPath = await findLogo(observerDir, team.imageFileName);
    if (!logoPath) {
      console.warn(`${LOG_PREFIX} Could not find image in ${LOGOS_DIR}/ or ${TEAM_ICON_DIR}/`, {
        team: team.teamName,
        image: team.imageFileName,
      });
      continue;
    }

    const accent = await tools.readColor(logoPath);
    const teamColor = makeUniqueColor(accent, usedColors);

    await tools.addSlotNumber(logoPath, team.teamNumber, join(iconDir, team.imageFileName), options.badge);

    rows.push({
      teamNumber: team.teamNumber,
      teamName: team.teamName,
      teamShortName: team.shortName,
      imageFileName: team.imageFileName,
      teamColor,
    });
  }

  return rows;
}
