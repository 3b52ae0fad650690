// src/lib/graphics/glyphs.ts
// Unicode glyphs for bodies and signs.

import type { Body } from '@/lib/planets/bodies';
import type { SignName } from '@/lib/astro';

const BODY_CHARS: Record<Body, string> = {
  Sun: '☉', Moon: '☽', Mercury: '☿', Venus: '♀', Mars: '♂',
  Jupiter: '♃', Saturn: '♄', Uranus: '♅', Neptune: '♆', Pluto: '♇',
  NorthNode: '☊', SouthNode: '☋',
};

// U+FE0E keeps text presentation instead of emoji
const SIGN_CHARS: Record<SignName, string> = {
  Aries: '♈︎', Taurus: '♉︎', Gemini: '♊︎', Cancer: '♋︎', Leo: '♌︎', Virgo: '♍︎',
  Libra: '♎︎', Scorpio: '♏︎', Sagittarius: '♐︎', Capricorn: '♑︎', Aquarius: '♒︎', Pisces: '♓︎',
};

export function bodyChar(body: Body): string {
  return BODY_CHARS[body];
}

export function signChar(sign: SignName): string {
  return SIGN_CHARS[sign];
}
