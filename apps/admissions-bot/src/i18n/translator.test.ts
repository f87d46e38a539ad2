import { describe, expect, it } from 'vitest';
import { LOCALES } from '@admissions/shared-kernel';
import { CatalogTranslator, loadCatalog } from './translator';

const catalog = {
  greeting: { ru: 'Привет, {name}!', en: 'Hello, {name}!' },
  nested: { deep: { en: 'Deep {school}' } },
};

describe('CatalogTranslator', () => {
  const translator = new CatalogTranslator(catalog, 'ru', { school: 'Test School' });

  it('substitutes named values', () => {
    expect(translator.t('greeting', 'en', { name: 'Jane' })).toBe('Hello, Jane!');
  });

  it('falls back to the default locale', () => {
    expect(translator.t('greeting', 'tr', { name: 'Ali' })).toBe('Привет, Ali!');
  });

  it('falls back to the key when nothing matches', () => {
    expect(translator.t('missing.key', 'en')).toBe('missing.key');
    expect(translator.t('nested.deep', 'uz')).toBe('nested.deep');
  });

  it('applies global substitutions and leaves unknown placeholders', () => {
    expect(translator.t('nested.deep', 'en')).toBe('Deep Test School');
    expect(translator.t('greeting', 'en')).toBe('Hello, {name}!');
  });
});

describe('bundled catalog', () => {
  const translator = new CatalogTranslator(loadCatalog(), 'ru');

  it('covers every locale for the phone re-prompt', () => {
    for (const locale of LOCALES) {
      expect(translator.t('invalid_phone', locale)).not.toBe('invalid_phone');
    }
  });

  it('localizes nested button labels', () => {
    expect(translator.t('programs.ib', 'en')).toBe('🎓 IB Program');
    expect(translator.t('child_age', 'en', { num: 2 })).toBe('Age of child #2?');
  });
});
