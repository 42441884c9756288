import { labelledValue, normalizeLabel, ownerOf, Term } from '../terms';

describe('normalizeLabel', () => {
  it('lowercases and drops whitespace and colons', () => {
    expect(normalizeLabel('  District :\t')).toBe('district');
    expect(normalizeLabel('NAME OF\nDISTRICT')).toBe('nameofdistrict');
  });
});

describe('Term', () => {
  const district = Term.of('DISTRICT', ['DISTRICT:', 'District', 'DISTRICT/REGION']);
  const subject = Term.of('SUBJECT', ['SUBJECT:', 'Subject', 'Subject:']);

  it('always includes the main label among its aliases', () => {
    expect(Term.single('CONCLUSION').aliases).toEqual(new Set(['CONCLUSION']));
    expect(Term.pair('RECOMMENDATIONS', 'RECOMMENDATIONS FOR IMPROVEMENT').aliases.size).toBe(2);
  });

  it('matches exactly after trimming only', () => {
    expect(district.matchesExact('  District  ')).toBe(true);
    expect(district.matchesExact('district')).toBe(false);
    expect(district.matchesExact('District:  ')).toBe(false);
  });

  it('matches drifted spellings after normalization', () => {
    expect(district.matchesNormalized('district:')).toBe(true);
    expect(district.matchesNormalized('Dis trict')).toBe(true);
    expect(district.matchesNormalized('district/region')).toBe(true);
    expect(district.matchesNormalized('districts')).toBe(false);
  });

  it('matches() tries both tiers', () => {
    expect(district.matches('DiStRiCt:')).toBe(true);
    expect(district.matches('The district office')).toBe(false);
  });

  it('detects a label at the start of a text', () => {
    expect(subject.startsWith('Subject: Physics')).toBe(true);
    expect(subject.startsWith('  SUBJECT Maths')).toBe(true);
    expect(subject.startsWith('The Subject')).toBe(false);
  });

  it('strips the longest leading alias and one colon', () => {
    expect(subject.strip('Subject: Physics')).toBe('Physics');
    expect(subject.strip('SUBJECT :  Life Sciences ')).toBe('Life Sciences');
    expect(subject.strip('Grade 12 Subject: Maths')).toBe('Grade 12  Maths');
    expect(subject.strip('Accounting')).toBe('Accounting');
  });

  it('compares by value', () => {
    expect(Term.pair('A', 'B').equals(Term.of('A', ['B']))).toBe(true);
    expect(Term.single('A').equals(Term.pair('A', 'B'))).toBe(false);
  });

  it('cannot be changed after construction', () => {
    expect(Object.isFrozen(district)).toBe(true);
  });
});

describe('ownerOf', () => {
  const good = Term.single('Areas of good practice / Innovation');
  const goodUpper = Term.single('AREAS OF GOOD PRACTICE / INNOVATION');

  it('prefers an exact spelling over an earlier normalized match', () => {
    expect(ownerOf([good, goodUpper], 'AREAS OF GOOD PRACTICE / INNOVATION')).toBe(goodUpper);
  });

  it('gives a drifted spelling to the earliest term', () => {
    expect(ownerOf([good, goodUpper], 'areas of good practice/innovation')).toBe(good);
  });

  it('returns undefined when nothing matches', () => {
    expect(ownerOf([good], 'Conclusion')).toBeUndefined();
  });
});

describe('labelledValue', () => {
  const subject = Term.of('SUBJECT', ['Subject', 'Subject:']);

  it('returns the value after a label', () => {
    expect(labelledValue(subject, 'Subject: Physics')).toBe('Physics');
    expect(labelledValue(subject, 'SUBJECT : Physics')).toBe('Physics');
  });

  it('needs a colon between label and value', () => {
    expect(labelledValue(subject, 'SUBJECT Physics')).toBeUndefined();
    expect(labelledValue(subject, 'Subject advisors should attend the workshop.')).toBeUndefined();
  });

  it('ignores words that merely begin with the label', () => {
    expect(labelledValue(subject, 'Subjects moderated this term')).toBeUndefined();
  });

  it('ignores a bare label', () => {
    expect(labelledValue(subject, 'Subject:')).toBeUndefined();
  });
});
