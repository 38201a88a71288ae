/**
 * Unit Tests for identifier parsing
 */

import { cleanIdentifier, parseChatId } from '../../src/utils/identifiers';

describe('parseChatId', () => {
  it.each([
    ['12345', '12345'],
    ['  12345 ', '12345'],
    ['<@12345>', '12345'],
    ['<@!12345>', '12345'],
    ['tg://user?id=12345', '12345'],
  ])('should extract the chat id from %s', (input, expected) => {
    expect(parseChatId(input)).toBe(expected);
  });

  it.each(['alice', '@alice', '12a45', '<@alice>', '', '123456789012345678901'])('should reject %j', (input) => {
    expect(parseChatId(input)).toBeNull();
  });
});

describe('cleanIdentifier', () => {
  it('should strip a leading @', () => {
    expect(cleanIdentifier('@alice')).toBe('alice');
  });

  it('should unwrap mentions', () => {
    expect(cleanIdentifier('<@!777>')).toBe('777');
  });

  it('should keep other names as written', () => {
    expect(cleanIdentifier('  Alice Smith ')).toBe('Alice Smith');
  });
});
