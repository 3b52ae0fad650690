// src/lib/graphics/tokens.ts
/**
 * Colors and ring radii shared by wheel layouts.
 */

import type { SignName } from '@/lib/astro';

export type AspectColorKey =
  | 'conjunction'
  | 'opposition'
  | 'trine'
  | 'square'
  | 'sextile';

export const SIGN_COLORS: Record<SignName, string> = {
  Aries:       '#E63946',
  Taurus:      '#8D6E63',
  Gemini:      '#FFD166',
  Cancer:      '#118AB2',
  Leo:         '#F4A261',
  Virgo:       '#2A9D8F',
  Libra:       '#E76F51',
  Scorpio:     '#6D597A',
  Sagittarius: '#06D6A0',
  Capricorn:   '#264653',
  Aquarius:    '#457B9D',
  Pisces:      '#A8DADC',
};

export const ASPECT_COLORS: Record<AspectColorKey, string> = {
  conjunction: '#333333',
  opposition:  '#E63946',
  trine:       '#118AB2',
  square:      '#F4A261',
  sextile:     '#06D6A0',
};

// wheel geometry, in px
export const WHEEL = {
  size: 560,
  margin: 12,          // outer radius = size / 2 - margin
  signGlyphInset: 26,  // sign glyphs at R - 26
  bodyInset: 60,       // body markers at R - 60
  minBodySeparation: 8,
};
