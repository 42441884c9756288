import { MalformedScanError } from './errors';

/**
 * Step counter for positional scans over one document. The limit is
 * `factor * (items + 1)`, where `items` is the most steps a complete scan can
 * take, so any factor of 1 or more admits every well-formed scan. The guard is
 * a backstop: it only fires if a scan loop stops advancing, and then reports a
 * malformed document instead of running on.
 */
export class ScanGuard {
  readonly limit: number;
  private steps = 0;

  constructor(private readonly term: string, items: number, factor: number) {
    this.limit = factor * (items + 1);
  }

  tick(position: number): void {
    this.steps++;
    if (this.steps > this.limit) throw new MalformedScanError(this.term, position, this.limit);
  }
}
