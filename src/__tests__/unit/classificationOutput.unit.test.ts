/**
 * Unit Tests — Classification Output Parsing
 *
 * Model replies arrive fenced, wrapped in chatter, or with loosely typed
 * numbers. These tests pin down the strict path, the repair path and the
 * failures that must surface as ClassificationError.
 */
import {
  extractFirstJsonObject,
  parseClassificationOutput,
  stripFences,
  toBoundedInt,
} from '@infrastructure/clients/classificationOutput';
import { ClassificationError } from '@shared/errors/AppError';

const validOutput = {
  industry_bucket: 'Trades',
  mobility_fit: 90,
  security_fit: 40,
  voip_fit: 60,
  fleet_attach: 70,
  signal_after_hours: 1,
  signal_dispatch: 0,
  signal_field_work: 1,
  ai_reason: 'Crews in the field all day.',
};

describe('stripFences()', () => {
  it('should remove a json code fence', () => {
    expect(stripFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it('should leave unfenced text alone apart from trimming', () => {
    expect(stripFences('  {"a":1} ')).toBe('{"a":1}');
  });
});

describe('extractFirstJsonObject()', () => {
  it('should cut the object out of surrounding chatter', () => {
    expect(extractFirstJsonObject('Sure! {"a":{"b":2}} Hope that helps.')).toBe('{"a":{"b":2}}');
  });

  it('should return the stripped text when there is no object', () => {
    expect(extractFirstJsonObject('no json here')).toBe('no json here');
  });
});

describe('toBoundedInt()', () => {
  it('should pull the number out of strings like "85%"', () => {
    expect(toBoundedInt('85%', 0, 100)).toBe(85);
    expect(toBoundedInt('70/100', 0, 100)).toBe(70);
  });

  it('should clamp to the range', () => {
    expect(toBoundedInt(120, 0, 100)).toBe(100);
    expect(toBoundedInt(-5, 0, 100)).toBe(0);
  });

  it('should round fractions and map booleans to 0/1', () => {
    expect(toBoundedInt(0.6, 0, 1)).toBe(1);
    expect(toBoundedInt(true, 0, 1)).toBe(1);
    expect(toBoundedInt(false, 0, 1)).toBe(0);
  });

  it('should fall back to the lower bound for unusable values', () => {
    expect(toBoundedInt('yes', 0, 1)).toBe(0);
    expect(toBoundedInt(null, 0, 100)).toBe(0);
  });
});

describe('parseClassificationOutput()', () => {
  it('should accept a valid reply and map it to a Classification', () => {
    expect(parseClassificationOutput(JSON.stringify(validOutput))).toEqual({
      industryBucket: 'Trades',
      mobilityFit: 90,
      securityFit: 40,
      voipFit: 60,
      fleetAttach: 70,
      signalAfterHours: true,
      signalDispatch: false,
      signalFieldWork: true,
      aiReason: 'Crews in the field all day.',
    });
  });

  it('should accept a fenced reply', () => {
    const text = '```json\n' + JSON.stringify(validOutput) + '\n```';

    expect(parseClassificationOutput(text).mobilityFit).toBe(90);
  });

  it('should repair loosely typed fields', () => {
    const text = JSON.stringify({
      industry_bucket: '  Trades  ',
      mobility_fit: '85%',
      security_fit: 120,
      voip_fit: -5,
      fleet_attach: '70/100',
      signal_after_hours: true,
      signal_dispatch: 'yes',
      signal_field_work: 0.6,
      ai_reason: 'ok',
    });

    expect(parseClassificationOutput(text)).toEqual({
      industryBucket: 'Trades',
      mobilityFit: 85,
      securityFit: 100,
      voipFit: 0,
      fleetAttach: 70,
      signalAfterHours: true,
      signalDispatch: false,
      signalFieldWork: true,
      aiReason: 'ok',
    });
  });

  it('should default a missing bucket and reason', () => {
    const { industry_bucket: _bucket, ai_reason: _reason, ...rest } = validOutput;
    const result = parseClassificationOutput(JSON.stringify(rest));

    expect(result.industryBucket).toBe('Unknown');
    expect(result.aiReason).toBe('No reason provided.');
  });

  it('should truncate an over-long reason to 400 characters', () => {
    const result = parseClassificationOutput(JSON.stringify({ ...validOutput, ai_reason: 'x'.repeat(500) }));

    expect(result.aiReason).toHaveLength(400);
  });

  it('should truncate by character without splitting an emoji', () => {
    const reason = `${'a'.repeat(399)}🚚 dispatch`;

    const result = parseClassificationOutput(JSON.stringify({ ...validOutput, ai_reason: reason }));

    expect(result.aiReason).toBe(`${'a'.repeat(399)}🚚`);
  });

  it('should accept a 400-character reason that ends in an emoji as is', () => {
    const reason = `${'a'.repeat(399)}🚚`;

    expect(parseClassificationOutput(JSON.stringify({ ...validOutput, ai_reason: reason })).aiReason).toBe(reason);
  });

  it('should throw ClassificationError when the reply is not JSON', () => {
    expect(() => parseClassificationOutput('I cannot help with that')).toThrow(
      new ClassificationError('Classifier output not parseable as JSON: I cannot help with that'),
    );
  });

  it('should throw ClassificationError when the reply is JSON but not an object', () => {
    expect(() => parseClassificationOutput('[1, 2]')).toThrow(ClassificationError);
  });
});
