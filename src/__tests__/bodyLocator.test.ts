import { describe, it, expect } from 'vitest';
import { locateBody } from '../dwar/bodyLocator.js';

function doc(...lines: string[]): string {
  return lines.join('\n');
}

describe('locateBody', () => {
  it('takes the first tab-delimited line after the metadata block as header', () => {
    const body = locateBody(doc(
      '<column properties>',
      '<columnName="Structure">',
      '</column properties>',
      'ID\tStructure\tName',
      '1\tABC\tfoo',
      '2\tDEF\tbar',
    ));
    expect(body.header).toEqual(['ID', 'Structure', 'Name']);
    expect(body.dataRows).toEqual([
      ['1', 'ABC', 'foo'],
      ['2', 'DEF', 'bar'],
    ]);
  });

  it('ignores tab-delimited lines before the metadata block closes', () => {
    const body = locateBody(doc(
      'a\tb\tc',
      '<column properties>',
      '</column properties>',
      'ID\tStructure\tName',
      '1\tABC\tfoo',
    ));
    expect(body.header).toEqual(['ID', 'Structure', 'Name']);
    expect(body.dataRows).toEqual([['1', 'ABC', 'foo']]);
  });

  it('skips candidate headers with fewer than three fields', () => {
    const body = locateBody(doc(
      '<column properties>',
      '</column properties>',
      'ID\tStructure',
      'ID\tStructure\tName',
      '1\tABC\tfoo',
    ));
    expect(body.header).toEqual(['ID', 'Structure', 'Name']);
    expect(body.dataRows).toEqual([['1', 'ABC', 'foo']]);
  });

  it('reports no header and no rows when nothing qualifies', () => {
    const body = locateBody(doc(
      '<column properties>',
      '</column properties>',
      'ID\tStructure',
      '1\tABC',
      '2\tDEF',
    ));
    expect(body.header).toBeNull();
    expect(body.dataRows).toEqual([]);
  });

  it('never collects rows without a metadata block', () => {
    const body = locateBody(doc(
      'ID\tStructure\tName',
      '1\tABC\tfoo',
    ));
    expect(body.header).toBeNull();
    expect(body.dataRows).toEqual([]);
  });

  it('skips markup, settings and tab-less lines among the data', () => {
    const body = locateBody(doc(
      '<column properties>',
      '</column properties>',
      'ID\tStructure\tName',
      '1\tABC\tfoo',
      '<datawarrior properties>',
      '<detailView\t"x">',
      '>\tcontinuation',
      'settings=\ta\tb',
      'free text',
      '',
      '2\tDEF\tbar',
    ));
    expect(body.dataRows).toEqual([
      ['1', 'ABC', 'foo'],
      ['2', 'DEF', 'bar'],
    ]);
  });

  it('keeps empty edge cells in place', () => {
    const body = locateBody(doc(
      '<column properties>',
      '</column properties>',
      'ID\tStructure\tName',
      '\tABC\t',
    ));
    expect(body.dataRows).toEqual([['', 'ABC', '']]);
  });

  it('does not take a tab-only line as the header', () => {
    const body = locateBody(doc(
      '<column properties>',
      '</column properties>',
      '\t\t',
      'ID\tStructure\tName',
      '1\tABC\tfoo',
    ));
    expect(body.header).toEqual(['ID', 'Structure', 'Name']);
    expect(body.dataRows).toEqual([['1', 'ABC', 'foo']]);
  });

  it('skips tab-only lines among the data', () => {
    const body = locateBody(doc(
      '<column properties>',
      '</column properties>',
      'ID\tStructure\tName',
      '1\tABC\tfoo',
      '\t\t\t\t',
      ' \t ',
      '2\tDEF\tbar',
    ));
    expect(body.dataRows).toEqual([
      ['1', 'ABC', 'foo'],
      ['2', 'DEF', 'bar'],
    ]);
  });
});
