import { DiagnosticsCollector } from '@/lib/diagnostics';

describe('DiagnosticsCollector', () => {
  it('should apply the default severity for each kind', () => {
    const diagnostics = new DiagnosticsCollector();
    diagnostics.add('unparsed-line', 'bad line');
    diagnostics.add('sudden-victory', 'overtime');

    expect(diagnostics.list().map((d) => d.severity)).toEqual(['warning', 'info']);
  });

  it('should let the caller override the severity', () => {
    const diagnostics = new DiagnosticsCollector();
    diagnostics.add('unmatched-competitor', 'not drafted', { severity: 'warning', lineNumber: 3 });

    expect(diagnostics.list()[0]).toEqual({
      kind: 'unmatched-competitor',
      severity: 'warning',
      message: 'not drafted',
      lineNumber: 3,
    });
  });

  it('should record addOnce entries once per kind and key', () => {
    const diagnostics = new DiagnosticsCollector();
    diagnostics.addOnce('unmatched-competitor', '125|walk on', 'first');
    diagnostics.addOnce('unmatched-competitor', '125|walk on', 'second');
    diagnostics.addOnce('ambiguous-competitor', '125|walk on', 'other kind');

    expect(diagnostics.list().map((d) => d.message)).toEqual(['first', 'other kind']);
  });

  it('should filter by kind', () => {
    const diagnostics = new DiagnosticsCollector();
    diagnostics.add('tie-breaker', 'a');
    diagnostics.add('sudden-victory', 'b');
    diagnostics.add('tie-breaker', 'c');

    expect(diagnostics.list('tie-breaker').map((d) => d.message)).toEqual(['a', 'c']);
    expect(diagnostics.size).toBe(3);
  });

  it('should merge entries and dedupe keys from another collector', () => {
    const main = new DiagnosticsCollector();
    const local = new DiagnosticsCollector();
    main.add('unparsed-line', 'main');
    local.addOnce('weight-mismatch', 'key', 'local');

    main.merge(local);
    main.addOnce('weight-mismatch', 'key', 'again');

    expect(main.list().map((d) => d.message)).toEqual(['main', 'local']);
  });

  it('should count entries per kind in the report', () => {
    const diagnostics = new DiagnosticsCollector();
    diagnostics.add('unparsed-line', 'a');
    diagnostics.add('unparsed-line', 'b');
    diagnostics.add('fallback-pattern', 'c');

    const report = diagnostics.report(['decision']);

    expect(report.counts).toEqual({ 'unparsed-line': 2, 'fallback-pattern': 1 });
    expect(report.entries).toHaveLength(3);
    expect(report.winPhrases).toEqual(['decision']);
  });

  it('should return copies that do not change the collector', () => {
    const diagnostics = new DiagnosticsCollector();
    diagnostics.add('unparsed-line', 'a');

    diagnostics.list().pop();
    diagnostics.report().entries.pop();

    expect(diagnostics.size).toBe(1);
  });
});
