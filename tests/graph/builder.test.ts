/**
 * Tests for the graph builder.
 */

import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../../src/core/config.js';
import { computeContentHash } from '../../src/core/hash.js';
import type { Diagnostic } from '../../src/core/types.js';
import { attachResults, buildGraph, GraphBuilder } from '../../src/graph/builder.js';
import { TraceGraph } from '../../src/graph/graph.js';
import { parseSourceUnit } from '../../src/parsers/index.js';
import type { SourceDomain, SourceUnit } from '../../src/parsers/types.js';
import { edge, result, test } from './nodes.js';

function unit(path: string, domain: SourceDomain, lines: string[]): SourceUnit {
  return { path, domain, content: lines.join('\n') };
}

function withCode(diagnostics: Diagnostic[], code: Diagnostic['code']): Diagnostic[] {
  return diagnostics.filter((diagnostic) => diagnostic.code === code);
}

const PRD = unit('spec/prd.md', 'spec', [
  '# Product requirements',
  '',
  '## REQ-p00001: User login',
  '',
  '**Level**: PRD | **Status**: Active',
  '',
  'Users sign in with a password.',
  '',
  '## Assertions',
  '',
  'A. The system SHALL accept a valid password.',
  'B. The system SHALL reject an invalid password.',
  '',
  '*End* *User login* | **Hash**: TBD',
  '---',
]);

const DEV = unit('spec/dev.md', 'spec', [
  '## REQ-d00001: Password check',
  '',
  '**Level**: Dev | **Implements**: REQ-p00001-A | **Status**: Active',
  '',
  'The service compares salted hashes.',
  '',
  '*End* *Password check*',
]);

const TESTS = unit('tests/test_auth.py', 'test', [
  '# Validates: REQ-d00001',
  'def test_password_check():',
  '    assert True',
]);

const RESULTS = unit('results/junit.xml', 'result', [
  '<testsuite>',
  '  <testcase classname="tests.test_auth" name="test_password_check" time="0.5"/>',
  '</testsuite>',
]);

describe('GraphBuilder', () => {
  it('should create nodes for every fragment kind', () => {
    const { graph, diagnostics } = buildGraph([PRD, DEV, TESTS, RESULTS]);

    expect([...graph.nodes()].map((node) => node.id).sort()).toEqual(
      [
        'REQ-d00001',
        'REQ-p00001',
        'REQ-p00001-A',
        'REQ-p00001-B',
        'rem:spec/dev.md:3',
        'rem:spec/prd.md:1',
        'rem:spec/prd.md:5',
        'result:results/junit.xml::tests.test_auth::test_password_check',
        'test:tests/test_auth.py::test_password_check',
      ].sort()
    );
    expect(diagnostics).toEqual([]);
  });

  it('should fill requirement fields', () => {
    const { graph } = buildGraph([PRD, DEV]);
    const node = graph.getNode('REQ-p00001');
    if (node.kind !== 'requirement') throw new Error('expected a requirement');

    expect(node.label).toBe('User login');
    expect(node.source).toEqual({ path: 'spec/prd.md', line: 3, endLine: 15 });
    expect(node.fields.level).toBe('prd');
    expect(node.fields.status).toBe('Active');
    expect(node.fields.hash).toBeNull();
    expect(node.fields.contentHash).toBe(computeContentHash(node.fields.body));
  });

  it('should contain assertions and sections in document order', () => {
    const { graph } = buildGraph([PRD]);

    expect([...graph.outgoing('REQ-p00001', 'contains')].map((e) => e.target)).toEqual([
      'rem:spec/prd.md:5',
      'REQ-p00001-A',
      'REQ-p00001-B',
    ]);
    expect(graph.getNode('rem:spec/prd.md:5').fields).toEqual({
      text: 'Users sign in with a password.',
      heading: 'preamble',
    });
  });

  it('should resolve assertion references and attach results', () => {
    const { graph } = buildGraph([PRD, DEV, TESTS, RESULTS]);

    expect([...graph.outgoing('REQ-d00001')]).toEqual([
      edge('REQ-d00001', 'rem:spec/dev.md:3', 'contains'),
      edge('REQ-d00001', 'REQ-p00001', 'implements', ['A']),
    ]);
    expect([...graph.outgoing('test:tests/test_auth.py::test_password_check')]).toEqual([
      edge('test:tests/test_auth.py::test_password_check', 'REQ-d00001', 'validates'),
      edge(
        'test:tests/test_auth.py::test_password_check',
        'result:results/junit.xml::tests.test_auth::test_password_check',
        'contains'
      ),
    ]);
  });

  it('should resolve references across files whatever the ingestion order', () => {
    const { graph } = buildGraph([RESULTS, TESTS, DEV, PRD]);

    expect([...graph.incoming('REQ-p00001', 'implements')].map((e) => e.source)).toEqual(['REQ-d00001']);
    expect([...graph.incoming('REQ-d00001', 'validates')]).toHaveLength(1);
  });

  it('should keep a duplicate id as a conflict copy', () => {
    const first = unit('spec/a.md', 'spec', ['## REQ-d00001: First', '', '*End* *First*']);
    const second = unit('spec/b.md', 'spec', ['## REQ-d00001: Second', '', '*End* *Second*']);
    const third = unit('spec/c.md', 'spec', ['## REQ-d00001: Third', '', '*End* *Third*']);

    const { graph, diagnostics } = buildGraph([first, second, third]);

    expect(graph.getNode('REQ-d00001').label).toBe('First');
    expect(graph.getNode('REQ-d00001__conflict')).toMatchObject({ isConflict: true, conflictWith: 'REQ-d00001', label: 'Second' });
    expect(graph.getNode('REQ-d00001__conflict2').label).toBe('Third');
    expect(withCode(diagnostics, 'duplicate-id').map((d) => d.message)).toEqual([
      'Duplicate id REQ-d00001 at spec/b.md:1; kept as REQ-d00001__conflict',
      'Duplicate id REQ-d00001 at spec/c.md:1; kept as REQ-d00001__conflict2',
    ]);
    expect(withCode(diagnostics, 'orphan').map((d) => d.message)).toEqual([
      'Orphan requirement: REQ-d00001',
      'Orphan requirement: REQ-d00001__conflict (duplicate of REQ-d00001)',
      'Orphan requirement: REQ-d00001__conflict2 (duplicate of REQ-d00001)',
    ]);
  });

  it('should not link from a conflict copy', () => {
    const copy = unit('spec/copy.md', 'spec', [
      '## REQ-d00001: Copy',
      '**Implements**: REQ-p00001',
      '*End* *Copy*',
    ]);
    const { graph } = buildGraph([PRD, DEV, copy]);

    expect([...graph.outgoing('REQ-d00001__conflict')]).toEqual([]);
  });

  it('should merge fragments that share a generated id', () => {
    const repeated = unit('tests/test_auth.py', 'test', [
      '# Validates: REQ-p00001-A',
      'def test_login():',
      '    pass',
      '# Validates: REQ-p00001-B',
      'def test_login():',
      '    pass',
    ]);
    const { graph } = buildGraph([PRD, repeated]);

    expect([...graph.nodesOfKind('test')].map((node) => node.id)).toEqual(['test:tests/test_auth.py::test_login']);
    expect([...graph.outgoing('test:tests/test_auth.py::test_login')].map((e) => e.assertionTargets)).toEqual([
      ['A'],
      ['B'],
    ]);
  });

  it('should report parse warnings with their location', () => {
    const broken = unit('spec/broken.md', 'spec', ['intro', '## REQ-X1: Bad']);
    const { diagnostics } = buildGraph([broken]);

    expect(withCode(diagnostics, 'parse-warning')).toEqual([
      {
        code: 'parse-warning',
        severity: 'warning',
        message: '[requirement] Malformed requirement id in header: REQ-X1',
        ids: [],
        location: { path: 'spec/broken.md', line: 2 },
      },
    ]);
  });

  it('should flag a declared hash that no longer matches', () => {
    const stale = unit('spec/stale.md', 'spec', [
      '## REQ-d00002: Check',
      '',
      'Body text.',
      '',
      '*End* *Check* | **Hash**: 0a1b2c3d',
    ]);
    const { diagnostics } = buildGraph([stale]);

    expect(withCode(diagnostics, 'stale-hash')).toEqual([
      {
        code: 'stale-hash',
        severity: 'warning',
        message: `REQ-d00002 declares hash 0a1b2c3d but its text hashes to ${computeContentHash('Body text.')}`,
        ids: ['REQ-d00002'],
        location: { path: 'spec/stale.md', line: 1, endLine: 5 },
      },
    ]);
  });

  it('should report cycles as errors unless allowed', () => {
    const loop = unit('spec/loop.md', 'spec', [
      '## REQ-d00001: One',
      '**Refines**: REQ-d00002',
      '*End* *One*',
      '## REQ-d00002: Two',
      '**Refines**: REQ-d00001',
      '*End* *Two*',
    ]);

    const strict = buildGraph([loop]);
    expect(withCode(strict.diagnostics, 'cycle')).toEqual([
      {
        code: 'cycle',
        severity: 'error',
        message: 'Cycle: REQ-d00001 -> REQ-d00002 -> REQ-d00001',
        ids: ['REQ-d00001', 'REQ-d00002'],
      },
    ]);

    const relaxed = buildGraph([loop], resolveConfig({ allowCycles: true }));
    expect(withCode(relaxed.diagnostics, 'cycle').map((d) => d.severity)).toEqual(['info']);
  });

  it('should build a very long document alongside others', () => {
    const long = unit(
      'spec/long.md',
      'spec',
      Array.from({ length: 200_000 }, (_, i) => `Line ${i + 1}`)
    );
    const { graph } = buildGraph([long, PRD, DEV]);

    expect(graph.getNode('rem:spec/long.md:1').source).toEqual({ path: 'spec/long.md', line: 1, endLine: 200_000 });
    expect(graph.has('REQ-d00001')).toBe(true);
  });

  it('should link a test through a reference in its docstring', () => {
    const docstring = unit('tests/test_login.py', 'test', [
      'def test_login():',
      '    """',
      '    Validates: REQ-d00001',
      '    """',
      '    assert True',
    ]);
    const { graph } = buildGraph([PRD, DEV, docstring]);

    expect([...graph.outgoing('test:tests/test_login.py::test_login')].map((e) => [e.kind, e.target])).toEqual([
      ['validates', 'REQ-d00001'],
    ]);
  });

  it('should join units parsed elsewhere', () => {
    const config = resolveConfig();
    const builder = new GraphBuilder(config);
    builder.addParsed(parseSourceUnit(PRD, config)).addParsed(parseSourceUnit(DEV, config));

    const { graph } = builder.build();
    expect(graph.has('REQ-p00001')).toBe(true);
    expect(graph.has('REQ-d00001')).toBe(true);
  });
});

describe('attachResults', () => {
  it('should prefer the test whose module matches the classname', () => {
    const graph = new TraceGraph(resolveConfig());
    graph.createNode(test('tests/test_a.py', 'test_login'));
    graph.createNode(test('tests/test_b.py', 'test_login'));
    graph.createNode({ ...result('test_login', 'passed'), fields: { ...result('test_login', 'passed').fields, classname: 'tests.test_b' } });

    expect(attachResults(graph)).toBe(1);
    expect([...graph.outgoing('test:tests/test_b.py::test_login')].map((e) => e.kind)).toEqual(['contains']);
    expect([...graph.outgoing('test:tests/test_a.py::test_login')]).toEqual([]);
  });

  it('should leave results with no matching test unattached', () => {
    const graph = new TraceGraph(resolveConfig());
    graph.createNode(result('test_missing', 'failed'));

    expect(attachResults(graph)).toBe(0);
  });
});
