export type Span = {
	offset: number;
	/** 1-based */
	line: number;
	/** 1-based, in UTF-16 code units */
	column: number;
};

/** maps offsets of a source text to line and column */
export class Locator {
	private lineStarts: number[] = [0];

	constructor(source: string) {
		for (let i = 0; i < source.length; i++) {
			if (source.charCodeAt(i) === 0x0a) {
				this.lineStarts.push(i + 1);
			}
		}
	}

	locate(offset: number): Span {
		let low = 0;
		let high = this.lineStarts.length - 1;
		while (low < high) {
			const middle = (low + high + 1) >> 1;
			if (this.lineStarts[middle] <= offset) {
				low = middle;
			} else {
				high = middle - 1;
			}
		}

		return {
			offset,
			line: low + 1,
			column: offset - this.lineStarts[low] + 1,
		};
	}
}
