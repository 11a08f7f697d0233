/**
 * Request counters rendered in the Prometheus text format. Only what the
 * service itself knows: requests per route/status and matches returned.
 */
export class Metrics {
  private readonly requests = new Map<string, number>();
  private matchesReturned = 0;

  recordRequest(route: string, status: number): void {
    const key = `route="${route}",status="${status}"`;
    this.requests.set(key, (this.requests.get(key) ?? 0) + 1);
  }

  recordMatches(n: number): void {
    this.matchesReturned += n;
  }

  render(gauges: { entries: number; corpusBytes: number }): string {
    const lines: string[] = [
      "# HELP phrase_engine_requests_total HTTP requests handled.",
      "# TYPE phrase_engine_requests_total counter",
    ];
    for (const key of Array.from(this.requests.keys()).sort()) {
      lines.push(`phrase_engine_requests_total{${key}} ${this.requests.get(key) ?? 0}`);
    }
    lines.push(
      "# HELP phrase_engine_matches_total Matched spans returned by /matches.",
      "# TYPE phrase_engine_matches_total counter",
      `phrase_engine_matches_total ${this.matchesReturned}`,
      "# HELP phrase_engine_dictionary_entries Unique dictionary entries.",
      "# TYPE phrase_engine_dictionary_entries gauge",
      `phrase_engine_dictionary_entries ${gauges.entries}`,
      "# HELP phrase_engine_corpus_bytes Size of the loaded corpus.",
      "# TYPE phrase_engine_corpus_bytes gauge",
      `phrase_engine_corpus_bytes ${gauges.corpusBytes}`,
    );
    return lines.join("\n") + "\n";
  }
}
