import { EventEmitter } from 'events';

import { Comparator, RedBlackNode, RotationDirection, SentinelNode, TreeLinks } from './RedBlackNode.js';
import { insertValue } from './core/insertion.js';
import { removeNode } from './core/deletion.js';
import { countNodes, findViolations } from './invariants.js';
import { inOrder, levelOrder, LevelOrderEntry } from './traversal.js';

interface RedBlackTreeEvents<T> {
	'rotate': [direction: RotationDirection, value: T];
}

/**
 * Ordered set of values kept in a red-black tree.
 *
 * Values that compare equal share one node. With override mode on (the default) inserting
 * such a value replaces the stored one; with it off the insert is ignored.
 *
 * Not safe to mutate from one thread while another reads it. All operations are synchronous.
 * 'rotate' listeners run after the operation that rotated has rebalanced the tree and updated its size,
 * so a throwing listener cannot leave the tree half-fixed.
 */
export class RedBlackTree<T> extends EventEmitter<RedBlackTreeEvents<T>> {
	private readonly _sentinel = new SentinelNode<T>();
	private readonly _links: TreeLinks<T>;
	private readonly _comparator: Comparator<T>;
	private _size: number = 0;
	private _overrideMode: boolean;
	// Rotations made by the running operation, emitted once it has finished.
	private _pendingRotations: [direction: RotationDirection, value: T][] = [];

	constructor(comparator: Comparator<T>, { overrideMode }: {
		overrideMode?: boolean;
	} = {}) {
		super();
		this._comparator = comparator;
		this._overrideMode = overrideMode ?? true;
		this._links = {
			sentinel: this._sentinel,
			onRotate: (direction, node) => {
				this._pendingRotations.push([direction, node.value]);
			},
		};
	}

	public get size(): number {
		return this._size;
	}

	public isEmpty(): boolean {
		return this._size === 0;
	}

	public isOverrideMode(): boolean {
		return this._overrideMode;
	}

	// Only affects inserts made after the call.
	public setOverrideMode(overrideMode: boolean): void {
		this._overrideMode = overrideMode;
	}

	public find(value: T): T | undefined {
		const node = this._findNode(value);
		return node ? node.value : undefined;
	}

	public has(value: T): boolean {
		return this._findNode(value) !== null;
	}

	/**
	 * Adds a value.
	 * @returns The value previously stored under an equal key (replaced in override mode, kept otherwise),
	 * or undefined when the value was new.
	 */
	public insert(value: T): T | undefined {
		const result = insertValue(this._links, this._comparator, value, this._overrideMode);
		switch (result.kind) {
			case 'inserted':
				this._size++;
				this._emitRotations();
				return undefined;
			case 'replaced':
				return result.previous;
			case 'ignored':
				return result.existing;
		}
	}

	/**
	 * Removes the value comparing equal to `value`.
	 * @returns The removed (stored) value, or undefined when absent.
	 */
	public remove(value: T): T | undefined {
		const node = this._findNode(value);
		if (!node) {
			return undefined;
		}
		removeNode(this._links, node);
		this._size--;
		this._emitRotations();
		return node.value;
	}

	public clear(): void {
		this._sentinel.left = null;
		this._size = 0;
	}

	// In-order (ascending) values.
	public values(): Generator<T, void, undefined> {
		return inOrder(this._sentinel.left);
	}

	public [Symbol.iterator](): Generator<T, void, undefined> {
		return this.values();
	}

	// Each call starts a fresh breadth-first walk. Used by tree printers.
	public levelOrder(): Generator<LevelOrderEntry<T>, void, undefined> {
		return levelOrder(this._sentinel.left);
	}

	// Lists invariant violations. Empty when the tree is consistent.
	public verify(): string[] {
		const root = this._sentinel.left;
		const violations = findViolations(root, this._comparator);
		const count = countNodes(root);
		if (count !== this._size) {
			violations.push(`Size ${this._size} does not match node count ${count}.`);
		}
		return violations;
	}

	private _findNode(value: T): RedBlackNode<T> | null {
		let node = this._sentinel.left;
		while (node) {
			const cmp = this._comparator(value, node.value);
			if (cmp === 0) {
				return node;
			}
			// Same branching as findParent: anything that is not negative goes right.
			node = cmp < 0 ? node.left : node.right;
		}
		return null;
	}

	private _emitRotations(): void {
		const rotations = this._pendingRotations;
		this._pendingRotations = [];
		for (const [direction, value] of rotations) {
			this.emit('rotate', direction, value);
		}
	}
}
