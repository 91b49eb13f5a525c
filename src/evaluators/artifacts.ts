/**
 * Where image-bearing evaluators put the images they generate or receive.
 *
 * Reference images live next to the ground truth table when one is requested,
 * target images under the output directory of the `score` call. Otherwise both
 * go under the artifact directory, or a temporary directory removed by
 * `cleanup`. Paths are stored absolute so tables can be reloaded from anywhere.
 */

import { mkdtempSync } from 'node:fs';
import { rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, dirname, extname, join, resolve } from 'node:path';
import { createLogger } from '../logger.js';
import { IMAGE_EXTENSION, readImage, writeImage } from '../serialization/images.js';
import type { Image } from '../types.js';

const logger = createLogger('artifacts');

export type ArtifactPhase = 'reference' | 'target';

export class ImageArtifacts {
  private readonly gtData: string | null;
  private readonly artifactDir: string | null;
  private tempRoot: string | null = null;

  constructor(gtData: string | null, artifactDir: string | null = null) {
    this.gtData = gtData;
    this.artifactDir = artifactDir;
  }

  directory(phase: ArtifactPhase, outputDir: string | null): string {
    if (phase === 'reference' && this.gtData !== null) {
      const stem = basename(this.gtData, extname(this.gtData));
      return resolve(dirname(this.gtData), `${stem}_images`);
    }
    if (phase === 'target' && outputDir !== null) {
      return resolve(outputDir, 'target_images');
    }
    if (this.artifactDir !== null) {
      return resolve(this.artifactDir, `${phase}_images`);
    }
    if (this.tempRoot === null) {
      this.tempRoot = mkdtempSync(join(tmpdir(), 'divergence-bench-'));
    }
    return join(this.tempRoot, phase);
  }

  /** The temporary directory, once one has been created. */
  temporaryDirectory(): string | null {
    return this.tempRoot;
  }

  async save(
    phase: ArtifactPhase,
    outputDir: string | null,
    name: string,
    image: Image,
  ): Promise<string> {
    const path = join(this.directory(phase, outputDir), `${name}${IMAGE_EXTENSION}`);
    await writeImage(path, image);
    return path;
  }

  load(path: string): Promise<Image> {
    return readImage(path);
  }

  /** Remove the temporary directory and every image written to it. */
  async cleanup(): Promise<void> {
    if (this.tempRoot === null) return;
    const root = this.tempRoot;
    this.tempRoot = null;
    await rm(root, { recursive: true, force: true });
    logger.debug('Removed temporary images', { path: root });
  }
}
