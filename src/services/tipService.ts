import { z } from 'zod';
import tipTable from '../data/tips.json';
import type { Language } from '../types';

export type RandomSource = () => number;

const tipTableSchema = z
  .object({
    en: z.array(z.string().min(1)).min(1),
    'zh-CN': z.array(z.string().min(1)).min(1)
  })
  .refine((table) => table.en.length === table['zh-CN'].length, {
    message: 'tip tables must have the same length'
  });

const TIPS = tipTableSchema.parse(tipTable);

export const TIP_COUNT = TIPS.en.length;
export const DEFAULT_TIP_TEXT = 'Time to stand up and stretch.';

export function tipText(index: number, language: Language): string {
  const table = TIPS[language];
  return table[index % table.length];
}

function randomIndex(random: RandomSource, upper: number): number {
  return Math.min(upper - 1, Math.floor(random() * upper));
}

/** Picks prompt indexes so that two consecutive draws always differ. */
export class TipSelector {
  private lastIndex?: number;

  constructor(
    private readonly count: number = TIP_COUNT,
    private readonly random: RandomSource = Math.random
  ) {}

  next(): number {
    const count = Math.max(1, this.count);
    let index = randomIndex(this.random, count);
    if (this.lastIndex !== undefined && count > 1 && index === this.lastIndex) {
      // every other slot, offset by 1..count-1 from the collision
      index = (index + 1 + randomIndex(this.random, count - 1)) % count;
    }
    this.lastIndex = index;
    return index;
  }
}
