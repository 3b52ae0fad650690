// src/lib/planets/bodies.ts
import type { PlanetName } from '@/lib/ephemeris/oracle';

export type NodeName = 'NorthNode' | 'SouthNode';
export type Body = PlanetName | NodeName;

export const PLANETS: readonly PlanetName[] = [
  'Sun', 'Moon', 'Mercury', 'Venus', 'Mars',
  'Jupiter', 'Saturn', 'Uranus', 'Neptune', 'Pluto',
];

export const NODES: readonly NodeName[] = ['NorthNode', 'SouthNode'];

export const ALL_BODIES: readonly Body[] = [...PLANETS, ...NODES];

const LABELS: Record<Body, string> = {
  Sun: 'Sun', Moon: 'Moon', Mercury: 'Mercury', Venus: 'Venus', Mars: 'Mars',
  Jupiter: 'Jupiter', Saturn: 'Saturn', Uranus: 'Uranus', Neptune: 'Neptune', Pluto: 'Pluto',
  NorthNode: 'North Node', SouthNode: 'South Node',
};

export function bodyLabel(body: Body): string {
  return LABELS[body];
}

export function isNode(body: Body): body is NodeName {
  return body === 'NorthNode' || body === 'SouthNode';
}
