import { StaleHandleError } from "../errors";

export interface GenerationHandle<T> {
  readonly generation: number;
  readonly target: T;
}

/**
 * Document generation counter shared by the view implementations. Every
 * navigation or document load calls `advance()`, which invalidates all
 * handles issued before it.
 */
export class HandleGenerations {
  private current = 0;

  get generation(): number {
    return this.current;
  }

  advance(): number {
    this.current += 1;
    return this.current;
  }

  wrap<T>(target: T): GenerationHandle<T> {
    return { generation: this.current, target };
  }

  unwrap<T>(handle: GenerationHandle<T>): T {
    if (handle.generation !== this.current) {
      throw new StaleHandleError(handle.generation, this.current);
    }
    return handle.target;
  }
}
