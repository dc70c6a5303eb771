import { describe, expect, it } from 'vitest';

import {
  collectCandidates,
  extractListingSpecs,
  extractRam,
  extractSpecs,
  resolveCpuCandidates,
  resolveGpuCandidates,
} from '../services/spec-extractor.js';

describe('extractRam', () => {
  it('skips storage sizes and keeps whitelisted memory', () => {
    expect(extractRam('128GB SSD 8GB RAM')).toBe('8GB');
  });

  it('ignores "de almacenamiento" phrasing', () => {
    expect(extractRam('256 gb de almacenamiento y 8 gb')).toBe('8GB');
  });

  it('keeps the largest plausible value under the ceiling', () => {
    expect(extractRam('16GB RAM ampliable a 32 GB')).toBe('32GB');
    expect(extractRam('16GB RAM ampliable a 32 GB', 16)).toBe('16GB');
  });

  it('accepts gigas and rejects sizes off the whitelist', () => {
    expect(extractRam('12 gigas de ram')).toBe('12GB');
    expect(extractRam('1000gb')).toBeNull();
  });
});

describe('extractSpecs', () => {
  it('normalizes CPU families', () => {
    expect(extractSpecs('Intel Core i7 16GB').cpu).toBe('INTEL I7');
    expect(extractSpecs('AMD Ryzen 5 5500U').cpu).toBe('AMD RYZEN 5');
    expect(extractSpecs('Macbook Pro M2 Pro 16GB').cpu).toBe('APPLE M2 PRO');
    expect(extractSpecs('Celeron N4020').cpu).toBe('INTEL CELERON');
    expect(extractSpecs('Surface Pro X SQ1').cpu).toBe('QUALCOMM SQ1');
  });

  it('never reports Apple silicon next to a PC processor', () => {
    expect(extractSpecs('Intel i5 con chip M1').cpu).toBe('INTEL I5');
    expect(extractSpecs('Ryzen 7 mejor que un M2').cpu).toBe('AMD RYZEN 7');
  });

  it('keeps the lexicographically greatest model', () => {
    expect(extractSpecs('i5 o i7, a elegir').cpu).toBe('INTEL I7');
  });

  it('derives the GPU brand from the model family', () => {
    expect(extractSpecs('Nvidia RTX3060').gpu).toBe('NVIDIA RTX 3060');
    expect(extractSpecs('GeForce GTX-1650').gpu).toBe('NVIDIA GTX 1650');
    expect(extractSpecs('AMD Radeon RX 6600M').gpu).toBe('AMD RX 6600M');
  });

  it('is idempotent on its own output', () => {
    for (const text of [
      'Portatil gaming MSI Intel Core i7 16GB RTX 3060',
      'Asus ROG Ryzen 7 6800H 16GB Radeon RX 6800M',
      'Macbook Pro M2 Pro 32GB',
    ]) {
      const specs = extractSpecs(text);
      const normalized = [specs.cpu, specs.ram, specs.gpu].filter(Boolean).join(' ');
      expect(extractSpecs(normalized)).toEqual(specs);
    }
  });
});

describe('candidate resolution', () => {
  it('collects raw candidates without deciding', () => {
    const candidates = collectCandidates('Intel i7 y Apple M1');
    expect(candidates.cpu.brand).toBe('INTEL');
    expect(Array.from(candidates.cpu.models).sort()).toEqual(['I7', 'M1']);
    expect(candidates.cpu.apple).toBe(true);
  });

  it('keeps only Apple models when no PC signal exists', () => {
    expect(
      resolveCpuCandidates({ brand: 'APPLE', models: new Set(['M1', 'M3 MAX']), apple: true })
    ).toBe('APPLE M3 MAX');
  });

  it('drops Apple models when a PC brand is present', () => {
    expect(resolveCpuCandidates({ brand: 'AMD', models: new Set(['M2']), apple: true })).toBeNull();
  });

  it('returns null for a GPU brand without a model', () => {
    expect(resolveGpuCandidates({ brand: 'NVIDIA', models: new Set() })).toBeNull();
  });
});

describe('extractListingSpecs', () => {
  it('only searches the first 400 description characters', () => {
    expect(extractListingSpecs('HP 250', `${'x '.repeat(210)}16GB RAM`).ram).toBeNull();
    expect(extractListingSpecs('HP 250', `${'x '.repeat(150)}16GB RAM`).ram).toBe('16GB');
  });

  it('prefers title values and fills gaps from the description', () => {
    expect(extractListingSpecs('Lenovo ThinkPad i5', '16GB de RAM, Intel i7')).toEqual({
      cpu: 'INTEL I5',
      ram: '16GB',
      gpu: null,
    });
  });
});
