import type { FilterDescriptor } from "../spi/types.js";
import { UnknownDescriptorError } from "./errors.js";

export class DescriptorRegistry {
  private descriptors = new Map<string, FilterDescriptor>();

  constructor(initial: Iterable<FilterDescriptor> = []) {
    for (const d of initial) this.register(d);
  }

  register(descriptor: FilterDescriptor): this {
    if (this.descriptors.has(descriptor.shortName)) {
      throw new Error(`Filter descriptor '${descriptor.shortName}' is already registered`);
    }
    this.descriptors.set(descriptor.shortName, descriptor);
    return this;
  }

  unregister(shortName: string): boolean {
    return this.descriptors.delete(shortName);
  }

  get(shortName: string): FilterDescriptor {
    const d = this.descriptors.get(shortName);
    if (!d) throw new UnknownDescriptorError(shortName);
    return d;
  }

  find(shortName: string): FilterDescriptor | undefined {
    return this.descriptors.get(shortName);
  }

  /** True if a descriptor with this short name is registered */
  has(shortName: string): boolean {
    return this.descriptors.has(shortName);
  }

  /** Short names in registration order */
  shortNames(): string[] {
    return Array.from(this.descriptors.keys());
  }

  list(): FilterDescriptor[] {
    return Array.from(this.descriptors.values());
  }

  /** Descriptors that can extract a value from the given record */
  supporting(record: unknown): FilterDescriptor[] {
    return this.list().filter(d => d.supportsRecord(record));
  }

  clear(): void {
    this.descriptors.clear();
  }

  get size(): number {
    return this.descriptors.size;
  }
}
