import type { Category, SpecSet } from '@app/types';

import { ENGINE_CONFIG } from './engine-config.js';
import { extractRam } from './spec-extractor.js';

const RAM_CEILINGS: Partial<Record<Category, number>> = ENGINE_CONFIG.RAM_CEILINGS;

export function ramCeiling(category: Category): number {
  return RAM_CEILINGS[category] ?? ENGINE_CONFIG.DEFAULT_RAM_CEILING;
}

function ramGigabytes(ram: string | null): number {
  if (!ram) return 0;
  const digits = ram.replace(/\D/g, '');
  return digits ? Number.parseInt(digits, 10) : 0;
}

/**
 * Re-validates specs against what the category can physically hold. Returns a new
 * SpecSet; an implausible RAM value is re-extracted under the ceiling or dropped.
 */
export function applyCategoryConstraints(specs: SpecSet, category: Category, fullText: string): SpecSet {
  const textLower = fullText.toLowerCase();
  const ceiling = ramCeiling(category);

  let ram = specs.ram;
  if (ramGigabytes(ram) > ceiling) {
    ram = extractRam(textLower, ceiling);
  }

  let cpu = specs.cpu;
  // "i7" in a chromebook listing is nearly always an acronym collision.
  if (category === 'CHROMEBOOK' && cpu?.includes('I7')) {
    if (textLower.includes('celeron')) cpu = 'INTEL CELERON';
    else if (textLower.includes('pentium')) cpu = 'INTEL PENTIUM';
  }

  return { cpu, ram, gpu: specs.gpu };
}
