import pino from 'pino';
import { describe, expect, it } from 'vitest';

import { InvalidCodeError } from '../errors';
import { isValidRiasecCode, loadRiasecFramework, parseRiasecCode, RiasecCodeTable } from '../riasec';
import { asLogger, createMockLogger } from './fakes';

const framework = loadRiasecFramework();
const codes = new RiasecCodeTable(framework, pino({ level: 'silent' }));

describe('parseRiasecCode', () => {
  it('trims and upper-cases the code', () => {
    expect(parseRiasecCode(' ira ')).toEqual(['I', 'R', 'A']);
  });

  it.each([
    ['RIAS', 'Invalid RIASEC code "RIAS": expected exactly 3 letters'],
    ['RI', 'Invalid RIASEC code "RI": expected exactly 3 letters'],
    ['XYZ', 'Invalid RIASEC code "XYZ": "X" is not one of RIASEC'],
    ['RRA', 'Invalid RIASEC code "RRA": letter "R" is repeated']
  ])('rejects %s', (input, message) => {
    expect(() => parseRiasecCode(input)).toThrow(InvalidCodeError);
    expect(() => parseRiasecCode(input)).toThrow(message);
  });

  it('reports a core-origin 400 error', () => {
    try {
      parseRiasecCode('AAA');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidCodeError);
      if (error instanceof InvalidCodeError) {
        expect(error.statusCode).toBe(400);
        expect(error.code).toBe('invalid_riasec_code');
        expect(error.origin).toBe('core');
      }
    }
  });

  it('exposes a boolean check', () => {
    expect(isValidRiasecCode('sec')).toBe(true);
    expect(isValidRiasecCode('SEE')).toBe(false);
  });
});

describe('RiasecCodeTable', () => {
  it('holds every ordered combination of three distinct letters', () => {
    expect(codes.size).toBe(120);
  });

  it('returns curated text for curated codes', () => {
    const description = codes.describe('ise');

    expect(description.code).toBe('ISE');
    expect(description.description).toBe(
      'Investigative-Social-Enterprising: driven to find answers, sharing them to help people, and rallying others around the findings.'
    );
    expect(description.gift).toBe('Translating evidence into decisions people can act on.');
    expect(description.themes).toEqual(['public health', 'consulting', 'research leadership']);
    expect(description.types).toEqual([
      { letter: 'I', name: 'Investigative', title: 'The Thinkers', role: 'core_drive' },
      { letter: 'S', name: 'Social', title: 'The Helpers', role: 'primary_expression' },
      { letter: 'E', name: 'Enterprising', title: 'The Persuaders', role: 'supporting_amplifier' }
    ]);
  });

  it('composes text for codes without a curated entry', () => {
    const description = codes.describe('RIA');

    expect(description.description).toBe(
      'Realistic-Investigative-Artistic: A drive to build, fix and make things work in the physical world, ' +
        'expressed through analysis and investigation and amplified by imagination and aesthetic sense.'
    );
    expect(description.gift).toBe('Making ideas tangible, with a talent for seeing what others miss.');
    expect(description.themes).toEqual([
      'skilled trades',
      'field operations',
      'equipment and machinery',
      'research and analysis',
      'design and media'
    ]);
  });

  it('rejects malformed codes on describe', () => {
    expect(() => codes.describe('IIS')).toThrow(InvalidCodeError);
  });

  it('skips curated entries with invalid codes', () => {
    const logger = createMockLogger();
    const table = new RiasecCodeTable(
      { ...framework, combinations: { ...framework.combinations, XQZ: { description: 'Not a code.', gift: '', themes: [] } } },
      asLogger(logger)
    );

    expect(table.size).toBe(120);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ key: 'XQZ' }),
      'Skipping curated combination with an invalid code'
    );
  });
});

describe('compareFit', () => {
  it('weights positional matches 3, 2 and 1 out of 6', () => {
    expect(codes.compareFit('IRA', 'ARI')).toBeCloseTo(2 / 6, 10);
    expect(codes.compareFit('IRA', 'IRA')).toBe(1);
    expect(codes.compareFit('IRA', 'SEC')).toBe(0);
    expect(codes.compareFit('ira', 'ISE')).toBe(0.5);
  });

  it('validates both codes', () => {
    expect(() => codes.compareFit('IRA', 'IR')).toThrow(InvalidCodeError);
  });
});

describe('assessFit', () => {
  it('grades a near match as excellent', () => {
    expect(codes.assessFit('IRA', 'irs')).toEqual({
      learnerCode: 'IRA',
      jobCode: 'IRS',
      fitScore: 0.833,
      fitLevel: 'Excellent',
      recommendation: 'Strong match - your interests align very well with this role.',
      positionMatches: [true, true, false],
      sharedTypes: ['I', 'R']
    });
  });

  it.each([
    ['ISE', 0.5, 'Good'],
    ['ARI', 0.333, 'Moderate'],
    ['SEC', 0, 'Low']
  ])('grades IRA against %s', (jobCode, fitScore, fitLevel) => {
    const assessment = codes.assessFit('IRA', jobCode);

    expect(assessment.fitScore).toBe(fitScore);
    expect(assessment.fitLevel).toBe(fitLevel);
  });

  it('lists shared letters in learner order regardless of position', () => {
    expect(codes.assessFit('IRA', 'ARI').sharedTypes).toEqual(['I', 'R', 'A']);
  });
});
