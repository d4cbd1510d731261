// Thrown when the tree structure contradicts the red-black invariants.
// Reaching one of these means a defect in the balancing code, not bad input.
export class InvalidStateError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'InvalidStateError';
	}
}
