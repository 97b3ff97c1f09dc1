import path from 'node:path';

export const waitFor = async (ms: number) => {
  await new Promise((resolve) => setTimeout(resolve, ms));
};

export const OUTPUT_DIR = path.join('actors', 'crawler', 'crawler-outputs');

/**
 * `<cwd>/actors/crawler/crawler-outputs/<site>-videos-<timestamp>.csv`
 */
export const defaultOutputPath = (site: string, now = new Date()) => {
  const timestamp = now.toISOString().replace(/[:.]/g, '-');
  return path.join(process.cwd(), OUTPUT_DIR, `${site}-videos-${timestamp}.csv`);
};

export const formatDuration = (ms: number) => {
  const totalSeconds = Math.round(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${seconds}s`;
};
