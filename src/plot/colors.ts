/** Friendly color names mapped to hex values. */
export class ColorTable {
  readonly defaultColor: string;
  private colors: Map<string, string>;

  constructor(colors: Record<string, string> = {}, defaultColor = "") {
    this.colors = new Map(Object.entries(colors));
    this.defaultColor = defaultColor;
  }

  /**
   * Registered names resolve to their hex value and anything else passes
   * through unchanged. An empty name means no color is set.
   */
  resolve(name: string | undefined): string | undefined {
    if (!name) {
      return undefined;
    }
    return this.colors.get(name) ?? name;
  }

  get size(): number {
    return this.colors.size;
  }
}
