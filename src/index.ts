export { RedBlackTree } from './RedBlackTree.js';
export { Color, compareNumbers, compareStrings } from './RedBlackNode.js';
export type { Comparator, RotationDirection } from './RedBlackNode.js';
export type { ChildRelation, LevelOrderEntry } from './traversal.js';
export { InvalidStateError } from './errors.js';
export { formatEntry, formatLevelOrder } from './printer.js';
