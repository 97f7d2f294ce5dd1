import { describe, it, expect } from 'vitest';

import { formatVertex, parseVertex } from '../board/coordinates.js';
import { getHandicapVertices } from '../board/handicap.js';
import { createPosition, parseMoveList, parseMoveText } from '../board/position.js';
import { UnsupportedPositionError } from '../errors.js';

describe('GTP coordinates', () => {
  it('should parse vertices with I skipped', () => {
    expect(parseVertex('Q16', 19)).toEqual({ x: 15, y: 15 });
    expect(parseVertex('J1', 19)).toEqual({ x: 8, y: 0 });
    expect(parseVertex('e5', 9)).toEqual({ x: 4, y: 4 });
    expect(parseVertex('PASS', 9)).toBe('pass');
  });

  it('should format vertices', () => {
    expect(formatVertex({ x: 8, y: 0 })).toBe('J1');
    expect(formatVertex({ x: 18, y: 18 })).toBe('T19');
    expect(formatVertex('pass')).toBe('pass');
  });

  it('should reject malformed and off-board vertices', () => {
    expect(() => parseVertex('I5', 19)).toThrow(UnsupportedPositionError);
    expect(() => parseVertex('J10', 9)).toThrow('out of bounds');
    expect(() => parseVertex('E0', 9)).toThrow(UnsupportedPositionError);
    expect(() => parseVertex('tengen', 19)).toThrow('Invalid GTP coordinate');
  });
});

describe('Move parsing', () => {
  it('should parse both move text forms', () => {
    expect(parseMoveText('B Q16', 19)).toEqual({ color: 'B', coordinate: { x: 15, y: 15 } });
    expect(parseMoveText('w[C3]', 9)).toEqual({ color: 'W', coordinate: { x: 2, y: 2 } });
    expect(parseMoveText('W pass', 9)).toEqual({ color: 'W', coordinate: 'pass' });
    expect(parseMoveText('B[]', 9)).toEqual({ color: 'B', coordinate: 'pass' });
  });

  it('should parse move lists with any separator', () => {
    const expected = [
      { color: 'B', coordinate: { x: 4, y: 4 } },
      { color: 'W', coordinate: { x: 2, y: 2 } },
    ];
    expect(parseMoveList('B E5, W C3', 9)).toEqual(expected);
    expect(parseMoveList('B E5;W C3', 9)).toEqual(expected);
    expect(parseMoveList('B[E5];W[C3]', 9)).toEqual(expected);
    expect(parseMoveList('  ', 9)).toEqual([]);
  });

  it('should reject malformed moves', () => {
    expect(() => parseMoveText('X E5', 9)).toThrow('Invalid move');
    expect(() => parseMoveText('B', 9)).toThrow(UnsupportedPositionError);
  });
});

describe('createPosition', () => {
  it('should derive stones, occupied points and next player', () => {
    const position = createPosition({ boardSize: 9, komi: 7.5, moves: 'B E5, W C3' });

    expect(position.stones.size).toBe(2);
    expect(position.stones.get('4,4')?.color).toBe('B');
    expect([...position.occupied]).toEqual(['E5', 'C3']);
    expect(position.nextPlayer).toBe('B');
    expect(position.sequence).toHaveLength(2);
  });

  it('should default komi to 7.5', () => {
    expect(createPosition({ boardSize: 19 }).komi).toBe(7.5);
  });

  it('should treat passes as occupying nothing', () => {
    const position = createPosition({ boardSize: 9, moves: ['B E5', 'W pass'] });
    expect(position.occupied.size).toBe(1);
    expect(position.nextPlayer).toBe('B');
  });

  it('should place handicap stones before play with white to move', () => {
    const position = createPosition({ boardSize: 19, handicap: 2 });

    expect(position.komi).toBe(0.5);
    expect(position.handicapStones).toHaveLength(2);
    expect(position.occupied.has('D4')).toBe(true);
    expect(position.occupied.has('Q16')).toBe(true);
    expect(position.moves).toEqual([]);
    expect(position.nextPlayer).toBe('W');
  });

  it('should reject unsupported input before any work', () => {
    expect(() => createPosition({ boardSize: 10 })).toThrow('Unsupported board size');
    expect(() => createPosition({ boardSize: 9, komi: Number.NaN })).toThrow('finite');
    expect(() => createPosition({ boardSize: 9, handicap: 1 })).toThrow('Handicap');
    expect(() => createPosition({ boardSize: 9, handicap: 10 })).toThrow('Handicap');
    expect(() => createPosition({ boardSize: 9, moves: 'B E5, W E5' })).toThrow(
      'Point E5 is already occupied',
    );
    expect(() =>
      createPosition({ boardSize: 9, moves: [{ color: 'B', coordinate: { x: 9, y: 0 } }] }),
    ).toThrow('out of bounds');
    expect(() => createPosition({ boardSize: 19, handicap: 4, moves: 'W D16' })).toThrow(
      UnsupportedPositionError,
    );
  });
});

describe('Handicap placement', () => {
  it('should use star points per board size', () => {
    expect(getHandicapVertices(9, 5)).toEqual(['C3', 'G7', 'C7', 'G3', 'E5']);
    expect(getHandicapVertices(13, 4)).toEqual(['D4', 'K10', 'D10', 'K4']);
    expect(getHandicapVertices(19, 0)).toEqual([]);
  });
});
