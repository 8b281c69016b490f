import fs from 'fs/promises';
import path from 'path';
import { PipelineConfig } from '@foodchain/schema';
import { ConfigError } from './errors.js';

export function parsePipelineConfig(raw: unknown, file = '<inline>'): PipelineConfig {
  const res = PipelineConfig.safeParse(raw);
  if (!res.success) {
    throw new ConfigError(file, res.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`));
  }
  return res.data;
}

/** Reads the run config; relative input and output paths resolve against the working directory. */
export async function loadPipelineConfig(file: string): Promise<PipelineConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(file, 'utf8'));
  } catch (e) {
    throw new ConfigError(file, [e instanceof Error ? e.message : String(e)]);
  }
  const cfg = parsePipelineConfig(raw, file);
  return {
    ...cfg,
    zonesPath: path.resolve(cfg.zonesPath),
    surveyPath: path.resolve(cfg.surveyPath),
    traitTablePath: path.resolve(cfg.traitTablePath),
    outDir: path.resolve(cfg.outDir),
  };
}
