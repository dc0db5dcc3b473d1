import { readFileSync } from 'fs';

export function loadFixture(name: 'live.json' | 'mixtapes.json'): unknown {
  return JSON.parse(readFileSync(new URL(`./${name}`, import.meta.url), 'utf-8'));
}
