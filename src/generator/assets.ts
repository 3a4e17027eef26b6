import { cpSync, existsSync, readdirSync, rmSync } from "node:fs";

export interface AudioCopyResult {
  source: string;
  destination: string;
  /** Top-level entries in the destination ending in the audio extension. */
  audioFiles: number;
}

/**
 * Replace `destination` wholesale with a copy of `source`. Symlinks are
 * followed so the output holds the file contents, not links into this machine.
 */
export function mirrorDirectory(source: string, destination: string): void {
  rmSync(destination, { recursive: true, force: true });
  cpSync(source, destination, { recursive: true, dereference: true });
}

export function countByExtension(dir: string, extension: string): number {
  return readdirSync(dir).filter((name) => name.endsWith(extension)).length;
}

/**
 * Mirror a client's audio folder into its output directory.
 * Returns null when the client has no audio folder; nothing is touched then.
 */
export function copyAudio(
  source: string,
  destination: string,
  extension: string,
): AudioCopyResult | null {
  if (!existsSync(source)) return null;

  mirrorDirectory(source, destination);
  return {
    source,
    destination,
    audioFiles: countByExtension(destination, extension),
  };
}
