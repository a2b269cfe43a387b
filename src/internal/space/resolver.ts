import { ResolutionError } from "../errors.js";

import type { ContentSpace } from "./space.js";

/** Picks the first space, in configured priority order, whose patterns match. */
export class SpaceResolver<T> {
  readonly #spaces: readonly ContentSpace<T>[];

  constructor(spaces: Iterable<ContentSpace<T>>) {
    this.#spaces = [...spaces];
  }

  get spaces(): readonly ContentSpace<T>[] {
    return this.#spaces;
  }

  resolve(docPath: string): ContentSpace<T> | null {
    return this.#spaces.find((space) => space.matches(docPath)) ?? null;
  }

  /** Like `resolve`, but a path outside every space is a `ResolutionError`. */
  require(docPath: string): ContentSpace<T> {
    const space = this.resolve(docPath);
    if (space === null) {
      throw new ResolutionError({ code: "RESOLUTION_FAILED", docPath, reason: "no-space" });
    }
    return space;
  }

  get(name: string): ContentSpace<T> | null {
    return this.#spaces.find((space) => space.name === name) ?? null;
  }
}
