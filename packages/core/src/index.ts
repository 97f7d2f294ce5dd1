/**
 * @gobook/core - Position model and symmetry-aware position identity
 */

export { UnsupportedPositionError } from './errors.js';

// Board
export {
  GTP_COLUMNS,
  isBoardSize,
  isOnBoard,
  parseVertex,
  formatVertex,
  pointKey,
} from './board/coordinates.js';
export { getHandicapVertices } from './board/handicap.js';
export {
  DEFAULT_KOMI,
  DEFAULT_HANDICAP_KOMI,
  createPosition,
  parseMoveText,
  parseMoveList,
  formatMoveKey,
  formatMoveText,
} from './board/position.js';
export type { Position, PositionInput, PlacedStone } from './board/position.js';

// Hashing
export { computePositionHash, hashToHex, isHashHex } from './storage/position-hash.js';

// Symmetry
export {
  ALL_SYMMETRIES,
  transformCoordinate,
  transformPoint,
  transformMove,
  transformVertex,
  inverseSymmetry,
} from './symmetry/transforms.js';
export {
  canonicalMoveKey,
  moveKeyVariants,
  validSymmetries,
  canonicalKey,
  toCanonicalOrientation,
  fromCanonicalOrientation,
  expandCandidates,
  sortCandidates,
  excludeOccupied,
  dedupeCandidates,
} from './symmetry/canonicalizer.js';
export type { MoveKeyVariant } from './symmetry/canonicalizer.js';
