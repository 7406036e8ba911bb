import { describe, it, expect } from 'vitest';
import { extractColumnProperties, listStructureColumns } from '../dwar/columnProperties.js';

function doc(...lines: string[]): string {
  return lines.join('\n');
}

describe('extractColumnProperties', () => {
  it('reads specialType and parent for each declared column', () => {
    const columns = extractColumnProperties(doc(
      '<column properties>',
      '<columnName="Structure">',
      '<columnProperty="specialType\tidcode">',
      '<columnName="idcoordinates2D">',
      '<columnProperty="specialType\tidcoordinates2D">',
      '<columnProperty="parent\tStructure">',
      '</column properties>',
    ));

    expect([...columns.keys()]).toEqual(['Structure', 'idcoordinates2D']);
    expect(columns.get('Structure')).toEqual({ type: 'string', specialType: 'idcode' });
    expect(columns.get('idcoordinates2D')).toEqual({
      type: 'string',
      specialType: 'idcoordinates2D',
      parent: 'Structure',
    });
  });

  it('returns an empty map without a metadata block', () => {
    const columns = extractColumnProperties(doc(
      '<columnName="Structure">',
      '<columnProperty="specialType\tidcode">',
      'ID\tStructure\tName',
    ));
    expect(columns.size).toBe(0);
  });

  it('ignores lines outside the block', () => {
    const columns = extractColumnProperties(doc(
      '<column properties>',
      '<columnName="A">',
      '</column properties>',
      '<columnName="B">',
    ));
    expect([...columns.keys()]).toEqual(['A']);
  });

  it('discards property lines before any column name', () => {
    const columns = extractColumnProperties(doc(
      '<column properties>',
      '<columnProperty="specialType\tidcode">',
      '<columnName="A">',
      '</column properties>',
    ));
    expect(columns.get('A')).toEqual({ type: 'string' });
  });

  it('leaves attributes untouched on malformed property lines', () => {
    const columns = extractColumnProperties(doc(
      '<column properties>',
      '<columnName="A">',
      '<columnProperty="specialType\tidcode">',
      '<columnProperty=specialType broken>',
      '<columnName="">',
      '</column properties>',
    ));
    expect(columns.get('A')).toEqual({ type: 'string', specialType: 'idcode' });
    expect(columns.size).toBe(1);
  });

  it('lets the last declaration of a column win', () => {
    const columns = extractColumnProperties(doc(
      '<column properties>',
      '<columnName="Structure">',
      '<columnProperty="specialType\tidcode">',
      '<columnName="Other">',
      '<columnName="Structure">',
      '<columnProperty="parent\tOther">',
      '</column properties>',
    ));
    expect(columns.get('Structure')).toEqual({ type: 'string', parent: 'Other' });
    expect([...columns.keys()]).toEqual(['Structure', 'Other']);
  });

  it('tolerates CRLF line endings and surrounding spaces', () => {
    const columns = extractColumnProperties(
      '<column properties>\r\n  <columnName="A">\r\n<columnProperty="specialType\tIDCode">\r\n</column properties>\r\n'
    );
    expect(columns.get('A')).toEqual({ type: 'string', specialType: 'IDCode' });
  });
});

describe('listStructureColumns', () => {
  it('lists idcode columns case-insensitively', () => {
    const columns = extractColumnProperties(doc(
      '<column properties>',
      '<columnName="Structure">',
      '<columnProperty="specialType\tidcode">',
      '<columnName="Reactant">',
      '<columnProperty="specialType\tIDCODE">',
      '<columnName="FragFp">',
      '<columnProperty="specialType\tFragFp">',
      '</column properties>',
    ));
    expect(listStructureColumns(columns)).toEqual(['Structure', 'Reactant']);
  });
});
