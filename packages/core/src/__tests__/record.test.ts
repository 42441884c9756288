import { defaultConfig } from '../config';
import { assemble, headerRow, recordToJSON, toRow } from '../record';

const header = { Province: 'Western Cape', District: 'West Coast', School: 'Test High', Subject: 'Physics' };
const sections = new Map([
  ['CONCLUSION', 'All good'],
  ['RECOMMENDATIONS', 'Use past papers'],
]);

describe('record', () => {
  it('lists header fields, sections and the source column', () => {
    expect(headerRow(defaultConfig)).toEqual([
      'Province',
      'District',
      'School',
      'Subject',
      'IDENTIFICATION OF IRREGULARITIES',
      'AREAS OF GOOD PRACTICE / INNOVATION',
      'AREAS THAT REQUIRE INTERVENTION AND SUPPORT',
      'RECOMMENDATIONS',
      'CONCLUSION',
      'File',
    ]);
  });

  it('orders a row like the header row, with missing sections empty', () => {
    const record = assemble(header, sections, 'data/report.docx');
    expect(toRow(record, defaultConfig)).toEqual([
      'Western Cape',
      'West Coast',
      'Test High',
      'Physics',
      '',
      '',
      '',
      'Use past papers',
      'All good',
      'data/report.docx',
    ]);
  });

  it('copies its inputs', () => {
    const values = new Map(sections);
    const record = assemble({ ...header }, values, 'a.docx');
    values.set('CONCLUSION', 'changed');
    expect(record.sections.get('CONCLUSION')).toBe('All good');
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.header)).toBe(true);
  });

  it('converts to a plain object', () => {
    expect(recordToJSON(assemble(header, sections, 'a.docx'))).toEqual({
      header,
      sections: { CONCLUSION: 'All good', RECOMMENDATIONS: 'Use past papers' },
      source: 'a.docx',
    });
  });
});
