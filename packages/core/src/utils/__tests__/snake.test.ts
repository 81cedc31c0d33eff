import { describe, it, expect } from 'vitest';

import { getWords, splitWordsOnRegex, toSnake } from '../snake';

describe('snake', () => {
  describe('getWords', () => {
    it.each([
      ['PotatoHumanAlien', ['Potato', 'Human', 'Alien']],
      ['Potato.Human.Alien', ['Potato', 'Human', 'Alien']],
      ['Potato-Human-Alien', ['Potato', 'Human', 'Alien']],
      ['Potato/Human/Alien', ['Potato', 'Human', 'Alien']],
      ['Potato_Human_Alien', ['Potato', 'Human', 'Alien']],
      ['Potato Human Alien', ['Potato', 'Human', 'Alien']],
      ['Honey', ['Honey']],
      ['DING', ['DING']],
      ['', []],
      [
        'orange beer-PotatoAlien_food.yummy/honey',
        ['orange', 'beer', 'Potato', 'Alien', 'food', 'yummy', 'honey'],
      ],
      ['HumanNAMEDJason', ['Human', 'NAMED', 'Jason']],
      ['Table2Name', ['Table2', 'Name']],
      ['v2beta', ['v2', 'beta']],
      ['Ünit', ['Ünit']],
      ['CaféBar', ['CaféBar']],
      ['Crème-Brûlée', ['Crème', 'Brûlée']],
    ])('should split %j into words', (input, expected) => {
      expect(getWords(input)).toEqual(expected);
    });
  });

  describe('toSnake', () => {
    it.each([
      ['PotatoHumanAlien', 'potato_human_alien'],
      ['Potato.Human.Alien', 'potato_human_alien'],
      ['Potato Human Alien', 'potato_human_alien'],
      ['Honey', 'honey'],
      ['DING', 'ding'],
      ['', ''],
      ['orange beer-PotatoAlien_food.yummy/honey', 'orange_beer_potato_alien_food_yummy_honey'],
      ['HumanNAMEDJason', 'human_named_jason'],
      ['TypeOptionsTable', 'type_options_table'],
      ['Ünit', 'ünit'],
      ['Crème Brûlée', 'crème_brûlée'],
    ])('should convert %j to %j', (input, expected) => {
      expect(toSnake(input)).toBe(expected);
    });

    it('should be deterministic across calls', () => {
      expect(toSnake('HTMLParser')).toBe('html_parser');
      expect(toSnake('HTMLParser')).toBe('html_parser');
    });
  });

  describe('splitWordsOnRegex', () => {
    it('should split on a regex', () => {
      expect(splitWordsOnRegex(['hello', 'world'], /\s/)).toEqual(['hello', 'world']);
      expect(splitWordsOnRegex(['hello-world', 'potato'], /-/)).toEqual([
        'hello',
        'world',
        'potato',
      ]);
      expect(splitWordsOnRegex(['hello|world|again'], /\|/)).toEqual(['hello', 'world', 'again']);
    });

    it('should accept a string pattern', () => {
      expect(splitWordsOnRegex(['hello,world', 'potato,3.8'], ',')).toEqual([
        'hello',
        'world',
        'potato',
        '3.8',
      ]);
    });

    it('should keep empty input as it is', () => {
      expect(splitWordsOnRegex([], /\s/)).toEqual([]);
      expect(splitWordsOnRegex([''], /\s/)).toEqual(['']);
    });

    it('should not mutate the input array', () => {
      const words = ['a-b'];
      splitWordsOnRegex(words, /-/);
      expect(words).toEqual(['a-b']);
    });
  });
});
