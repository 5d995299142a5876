import { describe, expect, it } from 'vitest';
import { classifyEvent } from '../EventClassifier.js';
import { UnclassifiableEventError } from '../../../types/errors.js';

describe('classifyEvent', () => {
  it('treats a payload without a discriminator as a declaration', () => {
    expect(classifyEvent({ work_order: 'OT1' })).toBe('DECLARE_PT');
  });

  it.each([
    ['DECLARE_PT', 'DECLARE_PT'],
    ['declare-pt', 'DECLARE_PT'],
    ['DeclarePT', 'DECLARE_PT'],
    ['CONSUMIR_VASOT', 'CONSUMIR_VASOT'],
    [' consumir vasot ', 'CONSUMIR_VASOT'],
    ['ConsumirVasot', 'CONSUMIR_VASOT'],
  ])('maps tipoEvento %j to %s', (value, kind) => {
    expect(classifyEvent({ tipoEvento: value })).toBe(kind);
  });

  it('reads the alternative discriminator fields', () => {
    expect(classifyEvent({ tipo_evento: 'CONSUMIR_VASOT' })).toBe('CONSUMIR_VASOT');
    expect(classifyEvent({ eventType: 'CONSUMIR_VASOT' })).toBe('CONSUMIR_VASOT');
  });

  it('lets the first present discriminator decide', () => {
    expect(classifyEvent({ tipoEvento: 'CONSUMIR_VASOT', eventType: 'AJUSTE' })).toBe('CONSUMIR_VASOT');
  });

  it('skips null discriminators', () => {
    expect(classifyEvent({ tipoEvento: null, tipo_evento: 'CONSUMIR_VASOT' })).toBe('CONSUMIR_VASOT');
    expect(classifyEvent({ tipoEvento: null })).toBe('DECLARE_PT');
  });

  it('rejects an unknown kind', () => {
    expect(() => classifyEvent({ tipoEvento: 'AJUSTE' })).toThrow(UnclassifiableEventError);
    expect(() => classifyEvent({ tipoEvento: 'AJUSTE' })).toThrow(
      'Cannot classify event: tipoEvento="AJUSTE" matches no known event kind'
    );
  });

  it('rejects a non-string discriminator', () => {
    expect(() => classifyEvent({ eventType: 5 })).toThrow(UnclassifiableEventError);
  });
});
