// A quantity is a number followed by a word: "1,500 blankets", "2000 ration packs"
const QUANTITY_PATTERN = /\b(\d{1,3}(?:,\d{3})+|\d+)\s+[a-z]/gi;

export const DEFAULT_HIGH_VOLUME_THRESHOLD = 1000;

export function extractQuantities(text: string): number[] {
  const quantities: number[] = [];
  for (const match of text.matchAll(QUANTITY_PATTERN)) {
    quantities.push(Number(match[1].replace(/,/g, '')));
  }
  return quantities;
}

/** True when any requested quantity strictly exceeds the threshold. */
export function detectHighVolume(text: string, threshold: number = DEFAULT_HIGH_VOLUME_THRESHOLD): boolean {
  return extractQuantities(text).some(quantity => quantity > threshold);
}
