import type { EndpointValue, PortAllocator, PortMapping } from '../types/compatibility.js';

const PORT_IN_STRING = /:(\d+)(?=\/|$)/g;
const BARE_PORT = /^\d+$/;

/**
 * Rewrites ports embedded in configuration values for one preparation pass.
 *
 * The original port number is the memo key, so every textual occurrence of an
 * endpoint (as `host:port`, a URL, a bare numeric string, or an integer) maps
 * to the same freshly allocated port.
 */
export class PortRemapper {
  readonly #allocator: PortAllocator;
  readonly #assigned = new Map<number, number>();
  readonly #allocated = new Set<number>();

  constructor(allocator: PortAllocator) {
    this.#allocator = allocator;
  }

  async remap(value: number): Promise<number>;
  async remap(value: string): Promise<string>;
  async remap(value: EndpointValue): Promise<EndpointValue>;
  async remap(value: EndpointValue): Promise<EndpointValue> {
    if (typeof value === 'number') {
      return this.#replacePort(value);
    }
    if (BARE_PORT.test(value)) {
      return String(await this.#replacePort(Number(value)));
    }

    const matches = [...value.matchAll(PORT_IN_STRING)];
    if (matches.length !== 1) {
      throw new Error(`Expected exactly one port in '${value}', found ${matches.length}.`);
    }
    const [match] = matches;
    const original = Number(match[1]);
    const replacement = await this.#replacePort(original);
    const index = match.index ?? value.lastIndexOf(match[0]);
    return `${value.slice(0, index)}:${replacement}${value.slice(index + match[0].length)}`;
  }

  mappings(): PortMapping[] {
    return [...this.#assigned.entries()].map(([originalPort, allocatedPort]) => ({
      originalPort,
      allocatedPort,
    }));
  }

  async #replacePort(original: number): Promise<number> {
    if (!Number.isInteger(original) || original < 1 || original > 65535) {
      throw new Error(`Port ${original} is outside the valid range 1-65535.`);
    }
    const known = this.#assigned.get(original);
    if (known !== undefined) {
      return known;
    }
    const allocated = await this.#allocator.allocate();
    if (this.#allocated.has(allocated)) {
      throw new Error(`Port allocator returned port ${allocated} twice within one preparation pass.`);
    }
    this.#allocated.add(allocated);
    this.#assigned.set(original, allocated);
    return allocated;
  }
}
