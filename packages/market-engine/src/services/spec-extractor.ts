import type { SpecSet } from '@app/types';

import { ENGINE_CONFIG } from './engine-config.js';
import { matchAll, matchFirst } from './pattern-matcher.js';
import {
  CPU_BRAND_BY_MODEL,
  CPU_BRAND_PATTERN,
  CPU_MODEL_RULES,
  GPU_BRAND_BY_MODEL,
  GPU_BRAND_PATTERN,
  GPU_MODEL_PATTERN,
  RAM_PATTERN,
} from './pattern-tables.js';
import { capDescription } from './text-sanitizer.js';

export type CpuCandidates = Readonly<{
  brand: string | null;
  models: ReadonlySet<string>;
  /** An Apple-silicon model was seen. */
  apple: boolean;
}>;

export type GpuCandidates = Readonly<{
  brand: string | null;
  models: ReadonlySet<string>;
}>;

export type SpecCandidates = Readonly<{
  ram: string | null;
  cpu: CpuCandidates;
  gpu: GpuCandidates;
}>;

const RAM_WHITELIST: ReadonlySet<number> = new Set(ENGINE_CONFIG.RAM_WHITELIST);
const APPLE_MODEL = /^M[123]/;
const PC_MODEL = /^(I\d$|RYZEN)/;

export function extractRam(text: string, maxGb: number = ENGINE_CONFIG.DEFAULT_RAM_CEILING): string | null {
  let best = 0;
  for (const match of matchAll(text.toLowerCase(), RAM_PATTERN)) {
    const value = Number.parseInt(match[1] ?? '', 10);
    if (RAM_WHITELIST.has(value) && value <= maxGb && value > best) {
      best = value;
    }
  }
  return best > 0 ? `${best}GB` : null;
}

function normalizeGpuModel(raw: string): string {
  const compact = raw.toUpperCase().replace(/[\s-]+/g, '');
  return compact.replace(/^([A-Z]+)(\d.*)$/, '$1 $2');
}

/** Raw detections only; every decision is left to the resolvers. */
export function collectCandidates(text: string): SpecCandidates {
  const textLower = text.toLowerCase();

  const cpuModels = new Set<string>();
  let apple = false;
  for (const rule of CPU_MODEL_RULES) {
    for (const match of matchAll(textLower, rule.pattern)) {
      const model = rule.toModel(match);
      if (!model) continue;
      cpuModels.add(model);
      if (rule.tag === 'APPLE_SILICON') apple = true;
    }
  }

  let gpuBrand = textLower.match(GPU_BRAND_PATTERN)?.[1]?.toUpperCase() ?? null;
  if (gpuBrand === 'GEFORCE') gpuBrand = 'NVIDIA';
  const gpuModels = new Set<string>();
  for (const match of matchAll(textLower, GPU_MODEL_PATTERN)) {
    if (match[1]) gpuModels.add(normalizeGpuModel(match[1]));
  }

  return {
    ram: extractRam(textLower),
    cpu: {
      brand: textLower.match(CPU_BRAND_PATTERN)?.[1]?.toUpperCase() ?? null,
      models: cpuModels,
      apple,
    },
    gpu: { brand: gpuBrand, models: gpuModels },
  };
}

// Lexicographically greatest key; "I9" > "I7" holds, "M3" > "I9" is incidental.
function bestModel(models: ReadonlySet<string>): string | null {
  const sorted = Array.from(models).sort();
  return sorted[sorted.length - 1] ?? null;
}

/**
 * Resolves brand/model conflicts and formats the canonical CPU string.
 * Apple silicon and PC processors never survive together.
 */
export function resolveCpuCandidates(candidates: CpuCandidates): string | null {
  let brand = candidates.brand;
  let models = Array.from(candidates.models);
  let apple = candidates.apple;

  const hasPcCpu =
    brand === 'INTEL' || brand === 'AMD' || models.some((model) => PC_MODEL.test(model));
  if (hasPcCpu && apple) {
    models = models.filter((model) => !APPLE_MODEL.test(model));
    apple = false;
  }
  if (apple) {
    brand = 'APPLE';
    models = models.filter((model) => APPLE_MODEL.test(model));
  }

  let best = bestModel(new Set(models));
  if (!best) return null;

  brand = apple ? 'APPLE' : (matchFirst(best, CPU_BRAND_BY_MODEL) ?? brand);
  if (best.startsWith('RYZEN')) best = best.replace(/^RYZEN(?=\d)/, 'RYZEN ');

  return brand ? `${brand} ${best}` : best;
}

export function resolveGpuCandidates(candidates: GpuCandidates): string | null {
  const best = bestModel(candidates.models);
  if (!best) return null;

  const brand = matchFirst(best, GPU_BRAND_BY_MODEL) ?? candidates.brand;
  if (!brand) return best;
  const model = best.replace(brand, '').trim();
  return `${brand} ${model}`;
}

export function extractSpecs(text: string): SpecSet {
  const candidates = collectCandidates(text);
  return {
    cpu: resolveCpuCandidates(candidates.cpu),
    ram: candidates.ram,
    gpu: resolveGpuCandidates(candidates.gpu),
  };
}

/**
 * Title detections win field by field; the description fills the gaps. Only the
 * first 400 characters of the description are searched.
 */
export function extractListingSpecs(title: string, description: string): SpecSet {
  const fromTitle = extractSpecs(title);
  const fromDescription = extractSpecs(capDescription(description));
  return {
    cpu: fromTitle.cpu ?? fromDescription.cpu,
    ram: fromTitle.ram ?? fromDescription.ram,
    gpu: fromTitle.gpu ?? fromDescription.gpu,
  };
}
