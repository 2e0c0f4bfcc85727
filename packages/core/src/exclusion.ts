export class ExclusionFilter {
  private readonly patterns: readonly string[];

  constructor(patterns: readonly string[] = []) {
    this.patterns = patterns.filter((pattern) => pattern.length > 0);
  }

  list(): string[] {
    return [...this.patterns];
  }

  matches(sessionId: string): boolean {
    return this.patterns.some((pattern) => sessionId.includes(pattern));
  }
}
