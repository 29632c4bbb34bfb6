/**
 * Tests for the distro fore/back table in src/recolor/fore-back.ts.
 */
import { describe, expect, it } from 'vitest';
import { listForeBackRecommendations, normalizeDistroName, recommendForeBack } from '../recolor/fore-back.js';

describe('normalizeDistroName', () => {
  it('keeps only lower-case letters and digits', () => {
    expect(normalizeDistroName('Pop!_OS')).toBe('popos');
    expect(normalizeDistroName('Ubuntu MATE')).toBe('ubuntumate');
  });
});

describe('recommendForeBack', () => {
  it('recommends outline 2, fill 1 for most listed distros', () => {
    expect(recommendForeBack('Fedora')).toEqual([2, 1]);
    expect(recommendForeBack('Ubuntu_old')).toEqual([2, 1]);
  });

  it('recommends outline 1, fill 2 for Antergos', () => {
    expect(recommendForeBack('Antergos')).toEqual([1, 2]);
  });

  it('matches names regardless of case and punctuation', () => {
    expect(recommendForeBack('pop-os')).toEqual([2, 1]);
    expect(recommendForeBack('ubuntu-mate')).toEqual([2, 1]);
    expect(recommendForeBack('FEDORA')).toEqual([2, 1]);
  });

  it('returns undefined for distros that get the full gradient', () => {
    expect(recommendForeBack('Arch')).toBeUndefined();
    expect(recommendForeBack('')).toBeUndefined();
  });
});

describe('listForeBackRecommendations', () => {
  it('lists every distro once with distinct slots', () => {
    const all = listForeBackRecommendations();
    expect(all).toHaveLength(23);
    expect(new Set(all.map((r) => normalizeDistroName(r.distro))).size).toBe(23);
    for (const { foreBack } of all) {
      expect(foreBack[0]).not.toBe(foreBack[1]);
    }
  });
});
