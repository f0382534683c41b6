import type { Identity } from "./types.js";

/**
 * Follower sequence plus position index. Removal swaps the departing entry with
 * the last one, so enumeration order changes across removals.
 */
export class FollowerSet {
  private readonly members: Identity[] = [];
  private readonly positions = new Map<Identity, number>();

  has(identity: Identity) {
    return this.positions.has(identity);
  }

  add(identity: Identity) {
    if (this.positions.has(identity)) return false;
    this.positions.set(identity, this.members.length);
    this.members.push(identity);
    return true;
  }

  remove(identity: Identity) {
    const position = this.positions.get(identity);
    if (position === undefined) return false;
    const lastIndex = this.members.length - 1;
    const last = this.members[lastIndex];
    if (position !== lastIndex && last !== undefined) {
      this.members[position] = last;
      this.positions.set(last, position);
    }
    this.members.pop();
    this.positions.delete(identity);
    return true;
  }

  get size() {
    return this.members.length;
  }

  toArray(): Identity[] {
    return [...this.members];
  }
}
