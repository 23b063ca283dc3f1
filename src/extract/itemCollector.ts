import { normalizeWhitespace } from "../utils/text";
import { NoiseContext, cleanItem } from "./noise";

/**
 * Ordered, near-duplicate-free item list. Two items are duplicates when one
 * contains the other, ignoring case; the longer one is kept in the position of
 * whichever arrived first.
 */
export class ItemCollector {
  private readonly items: string[] = [];
  private readonly noise: NoiseContext;

  constructor(noise: NoiseContext) {
    this.noise = noise;
  }

  /** Cleans and adds a raw candidate; returns whether the list changed. */
  add(raw: string): boolean {
    const item = cleanItem(raw, this.noise);
    if (item === null) return false;
    return this.accept(normalizeWhitespace(item));
  }

  addAll(raws: Iterable<string>): void {
    for (const raw of raws) this.add(raw);
  }

  get size(): number {
    return this.items.length;
  }

  toArray(): string[] {
    return [...this.items];
  }

  private accept(item: string): boolean {
    const lower = item.toLowerCase();
    if (this.items.some((existing) => existing.toLowerCase().includes(lower))) return false;

    const covered = this.items.findIndex((existing) => lower.includes(existing.toLowerCase()));
    if (covered === -1) {
      this.items.push(item);
      return true;
    }

    this.items[covered] = item;
    for (let index = this.items.length - 1; index > covered; index -= 1) {
      if (lower.includes(this.items[index].toLowerCase())) this.items.splice(index, 1);
    }
    return true;
  }
}

export function dedupeItems(raws: Iterable<string>, noise: NoiseContext): string[] {
  const collector = new ItemCollector(noise);
  collector.addAll(raws);
  return collector.toArray();
}
