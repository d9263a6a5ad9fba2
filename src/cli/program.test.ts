import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { CommanderError } from 'commander';
import { createProgram } from './program.js';
import { loadConfig } from '../utils/config.js';

const SALES_CSV = `produto,quantidade,preco_unitario,data_venda
Camiseta,3,49.9,2025-06-01
Calça,2,99.9,2025-06-05
Tênis,1,199.9,2025-06-03
`;

describe('sales-report CLI', () => {
  let dir: string;
  let csvPath: string;
  let out: string[];
  let err: string[];

  function run(args: string[], env: NodeJS.ProcessEnv = {}): void {
    const program = createProgram(
      { writeOut: (text) => out.push(text), writeErr: (text) => err.push(text) },
      loadConfig({ LOG_LEVEL: 'silent', ...env }),
    );
    program.exitOverride();
    program.parse(['node', 'sales-report', ...args]);
  }

  function runExpectingFailure(args: string[]): CommanderError {
    try {
      run(args);
    } catch (error) {
      if (error instanceof CommanderError) return error;
      throw error;
    }
    throw new Error('expected the command to fail');
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'sales-report-cli-'));
    csvPath = join(dir, 'vendas.csv');
    writeFileSync(csvPath, SALES_CSV, 'utf8');
    out = [];
    err = [];
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('prints the text report', () => {
    run([csvPath]);

    expect(err).toEqual([]);
    expect(out.join('')).toBe(
      [
        'Total de vendas por produto:',
        'Produto   Total (R$)',
        '--------  ----------',
        'Tênis         199.90',
        'Calça         199.80',
        'Camiseta      149.70',
        '',
        'Valor total de todas as vendas: R$ 549.40',
        'Produto mais vendido: Camiseta (3 unidades)',
        '',
      ].join('\n'),
    );
  });

  it('prints JSON with --format json', () => {
    run([csvPath, '--format', 'json']);

    const report = JSON.parse(out.join(''));
    expect(report.total_vendas).toBe(549.4);
    expect(Object.keys(report.vendas_por_produto)).toEqual(['Camiseta', 'Calça', 'Tênis']);
  });

  it('takes the default format from configuration', () => {
    run([csvPath], { SALES_REPORT_FORMAT: 'json' });
    expect(JSON.parse(out.join('')).produto_mais_vendido).toEqual({ nome: 'Camiseta', quantidade: 3 });
  });

  it('filters by date range', () => {
    run([csvPath, '--format', 'json', '--start-date', '2025-06-01', '--end-date', '2025-06-03']);

    const report = JSON.parse(out.join(''));
    expect(Object.keys(report.vendas_por_produto)).toEqual(['Camiseta', 'Tênis']);
    expect(report.total_vendas).toBe(349.6);
  });

  it('requires both date bounds', () => {
    const failure = runExpectingFailure([csvPath, '--start-date', '2025-06-01']);

    expect(failure.exitCode).toBe(1);
    expect(failure.code).toBe('sales-report.invalidOptions');
    expect(err).toEqual(['error: --start-date and --end-date must be given together\n']);
    expect(out).toEqual([]);
  });

  it('fails on an inverted range', () => {
    const failure = runExpectingFailure([csvPath, '--start-date', '2025-06-05', '--end-date', '2025-06-01']);

    expect(failure.exitCode).toBe(1);
    expect(failure.code).toBe('sales-report.INVALID_RANGE');
    expect(err).toEqual(['error: Start date 2025-06-05 is after end date 2025-06-01\n']);
  });

  it('fails on a malformed date', () => {
    const failure = runExpectingFailure([csvPath, '--start-date', '01/06/2025', '--end-date', '2025-06-03']);
    expect(failure.code).toBe('sales-report.INVALID_DATE');
  });

  it('fails when the file does not exist', () => {
    const missing = join(dir, 'nope.csv');
    const failure = runExpectingFailure([missing]);

    expect(failure.exitCode).toBe(1);
    expect(failure.code).toBe('sales-report.FILE_NOT_FOUND');
    expect(err).toEqual([`error: File not found: ${missing}\n`]);
  });

  it('fails on a header without required columns', () => {
    writeFileSync(csvPath, 'nome,valor\nA,1\n', 'utf8');
    const failure = runExpectingFailure([csvPath]);
    expect(failure.code).toBe('sales-report.MALFORMED_HEADER');
  });

  it('rejects an unknown format', () => {
    const failure = runExpectingFailure([csvPath, '--format', 'xml']);

    expect(failure.exitCode).toBe(1);
    expect(failure.code).toBe('commander.invalidArgument');
    expect(out).toEqual([]);
  });

  it('keeps rows that break constraints with --skip-validation', () => {
    writeFileSync(csvPath, 'produto,quantidade,preco_unitario\nCamiseta,0,49.90\nCalça,2,99.90\n', 'utf8');
    run([csvPath, '--format', 'json', '--skip-validation']);

    expect(JSON.parse(out.join('')).vendas_por_produto).toEqual({ Camiseta: 0, Calça: 199.8 });
  });
});
