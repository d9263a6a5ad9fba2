import { describe, it, expect } from 'vitest';
import { jsonObject, jsonString, renderTable } from './formats.js';

describe('renderTable', () => {
  it('pads columns to their widest cell', () => {
    const table = renderTable(
      [{ header: 'Name' }, { header: 'N', align: 'right' }],
      [
        ['ab', '1'],
        ['abcdef', '100'],
      ],
    );

    expect(table.split('\n')).toEqual([
      'Name      N',
      '------  ---',
      'ab        1',
      'abcdef  100',
    ]);
  });

  it('does not leave trailing spaces after a left-aligned last column', () => {
    const table = renderTable([{ header: 'Code' }, { header: 'Label' }], [['1', 'x']]);
    expect(table.split('\n')).toEqual(['Code  Label', '----  -----', '1     x']);
  });

  it('measures accented and astral characters as one column each', () => {
    const table = renderTable(
      [{ header: 'Produto' }, { header: 'N', align: 'right' }],
      [
        ['Te\u0302nis', '1'],
        ['Tênis', '2'],
        ['\u{1F381}', '3'],
      ],
    );

    expect(table.split('\n')).toEqual([
      'Produto  N',
      '-------  -',
      'Te\u0302nis    1',
      'Tênis    2',
      '\u{1F381}        3',
    ]);
  });

  it('renders only the header and rule without rows', () => {
    expect(renderTable([{ header: 'A' }], [])).toBe('A\n-');
  });
});

describe('jsonObject', () => {
  it('indents entries by depth', () => {
    expect(jsonObject([['a', '1'], ['b', jsonString('x')]], 1)).toBe('{\n    "a": 1,\n    "b": "x"\n  }');
  });

  it('writes an empty object inline', () => {
    expect(jsonObject([])).toBe('{}');
  });

  it('escapes keys', () => {
    expect(jsonObject([['say "hi"', 'true']])).toBe('{\n  "say \\"hi\\"": true\n}');
  });
});
