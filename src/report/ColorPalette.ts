// src/report/ColorPalette.ts

/**
 * Deterministic comment colours: the n-th comment of an asset always gets the
 * same colour, cycling through the palette.
 */
export class ColorPalette {
  private readonly colors: readonly string[];

  constructor(colors: string[]) {
    if (colors.length === 0) {
      throw new Error('Colour palette must not be empty');
    }
    this.colors = [...colors];
  }

  colorFor(commentIndex: number): string {
    const size = this.colors.length;
    return this.colors[((commentIndex % size) + size) % size];
  }

  get size(): number {
    return this.colors.length;
  }
}
