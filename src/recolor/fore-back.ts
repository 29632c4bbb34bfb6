import type { ForeBackPair } from '../types/index.js';

/** Distros whose logo outline is slot 2 and fill is slot 1 */
const OUTLINE_TWO_FILL_ONE = [
  'Anarchy',
  'ArchStrike',
  'Astra Linux',
  'Chapeau',
  'Fedora',
  'GalliumOS',
  'KrassOS',
  'Kubuntu',
  'Lubuntu',
  'openEuler',
  'Peppermint',
  'Pop!_OS',
  'Ubuntu Cinnamon',
  'Ubuntu Kylin',
  'Ubuntu MATE',
  'Ubuntu_old',
  'Ubuntu Studio',
  'Ubuntu Sway',
  'Ultramarine Linux',
  'Univention',
  'Vanilla',
  'Xubuntu',
] as const;

/** Distros whose logo outline is slot 1 and fill is slot 2 */
const OUTLINE_ONE_FILL_TWO = ['Antergos'] as const;

export interface ForeBackRecommendation {
  distro: string;
  foreBack: ForeBackPair;
}

const RECOMMENDATIONS: readonly ForeBackRecommendation[] = Object.freeze([
  ...OUTLINE_TWO_FILL_ONE.map((distro) => ({ distro, foreBack: [2, 1] as const })),
  ...OUTLINE_ONE_FILL_TWO.map((distro) => ({ distro, foreBack: [1, 2] as const })),
]);

/** Lower-case and drop everything but letters and digits: `Pop!_OS` → `popos`. */
export function normalizeDistroName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, '');
}

const BY_NAME: ReadonlyMap<string, ForeBackPair> = new Map(
  RECOMMENDATIONS.map(({ distro, foreBack }): [string, ForeBackPair] => [normalizeDistroName(distro), foreBack]),
);

/**
 * Recommended fore/back slots for a distro's logo, or `undefined` when the
 * logo should get the full gradient.
 */
export function recommendForeBack(distro: string): ForeBackPair | undefined {
  return BY_NAME.get(normalizeDistroName(distro));
}

/** Every distro with a recommendation, in table order. */
export function listForeBackRecommendations(): readonly ForeBackRecommendation[] {
  return RECOMMENDATIONS;
}
