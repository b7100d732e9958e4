import { ProviderResponseParseError } from '@/modules/carbon/domain/errors';
import {
  extractDishName,
  extractIngredientList,
  parseStringArray,
} from '@/modules/carbon/domain/response-extractor';
import { chatCompletionBody } from '../../../_helpers/carbon-fakes';

describe('response-extractor', () => {
  describe('extractIngredientList', () => {
    it('reads content that is a JSON array', () => {
      expect(extractIngredientList(chatCompletionBody('["rice","chicken","spices"]'))).toEqual([
        'rice',
        'chicken',
        'spices',
      ]);
    });

    it('finds a multi-line array inside prose', () => {
      const content = 'Sure! Here you go:\n[\n  "rice",\n  "chicken",\n  "spices"\n]\nEnjoy.';

      expect(extractIngredientList(chatCompletionBody(content))).toEqual([
        'rice',
        'chicken',
        'spices',
      ]);
    });

    it('falls back to the placeholder for free text', () => {
      expect(extractIngredientList(chatCompletionBody('It is mostly rice and chicken.'))).toEqual([
        'rice',
      ]);
    });

    it('falls back to the placeholder for an empty array', () => {
      expect(extractIngredientList(chatCompletionBody('[]'))).toEqual(['rice']);
    });

    it('scans the raw body when there is no content field', () => {
      expect(extractIngredientList('{"result":["beef","onion"]}')).toEqual(['beef', 'onion']);
    });

    it('treats non-string content as missing', () => {
      const raw = JSON.stringify({ choices: [{ message: { content: 42 } }] });

      expect(extractIngredientList(raw)).toEqual(['rice']);
    });

    it('throws on a body that is not JSON', () => {
      expect(() => extractIngredientList('<html>bad gateway</html>')).toThrow(
        ProviderResponseParseError,
      );
    });
  });

  describe('parseStringArray', () => {
    it('stringifies numeric items', () => {
      expect(parseStringArray('[1, "egg"]')).toEqual(['1', 'egg']);
    });

    it('rejects arrays with other item types', () => {
      expect(parseStringArray('["egg", {"name":"milk"}]')).toBeUndefined();
    });
  });

  describe('extractDishName', () => {
    it('returns the trimmed content', () => {
      expect(extractDishName(chatCompletionBody('  Pad Thai \n'))).toBe('Pad Thai');
    });

    it('returns an empty name when content is missing', () => {
      expect(extractDishName('{"choices":[]}')).toBe('');
    });
  });
});
