import { BLANK_SYMBOL } from '@shared/constants';
import type { Direction } from '@shared/types';

export type TapeSymbol = string;

/**
 * Single tape, unbounded in both directions. Stored as a plain array that
 * grows by appending blanks on the right and inserting blanks at the front
 * when the head walks off the left edge.
 */
export class Tape {
  private cells: TapeSymbol[] = [BLANK_SYMBOL];
  private position = 0;

  get head(): number {
    return this.position;
  }

  get length(): number {
    return this.cells.length;
  }

  /** Input characters followed by one blank sentinel, head on the first cell. */
  load(input: string): void {
    this.cells = [...Array.from(input), BLANK_SYMBOL];
    this.position = 0;
  }

  read(): TapeSymbol {
    this.padRight();
    return this.cells[this.position];
  }

  write(symbol: TapeSymbol): void {
    this.padRight();
    this.cells[this.position] = symbol;
  }

  move(direction: Direction): void {
    if (direction === 'R') {
      this.position += 1;
      this.padRight();
      return;
    }

    this.position -= 1;
    if (this.position < 0) {
      this.cells.unshift(BLANK_SYMBOL);
      this.position = 0;
    }
  }

  /** Trailing blanks are dropped; leading blanks are kept. */
  content(): string {
    let end = this.cells.length;
    while (end > 0 && this.cells[end - 1] === BLANK_SYMBOL) {
      end -= 1;
    }
    return this.cells.slice(0, end).join('');
  }

  symbols(): TapeSymbol[] {
    return [...this.cells];
  }

  private padRight(): void {
    while (this.position >= this.cells.length) {
      this.cells.push(BLANK_SYMBOL);
    }
  }
}
