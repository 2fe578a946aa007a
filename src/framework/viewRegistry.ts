/**
 * View Registry
 *
 * Named views of an application. The first registered view is the default
 * unless another one is marked as such.
 *
 * @module framework/viewRegistry
 */

import type { View } from './context';

export class ViewRegistry {
  private readonly views = new Map<string, View>();
  private defaultName?: string;

  register(name: string, view: View, options: { default?: boolean } = {}): this {
    this.views.set(name, view);
    if (options.default || this.defaultName === undefined) {
      this.defaultName = name;
    }
    return this;
  }

  /** View by name, or the default view when no name is given. */
  get(name?: string): View | undefined {
    const key = name ?? this.defaultName;
    return key === undefined ? undefined : this.views.get(key);
  }

  has(name: string): boolean {
    return this.views.has(name);
  }

  setDefault(name: string): this {
    if (!this.views.has(name)) {
      throw new Error(`Cannot make unknown view '${name}' the default`);
    }
    this.defaultName = name;
    return this;
  }

  get defaultViewName(): string | undefined {
    return this.defaultName;
  }

  names(): string[] {
    return [...this.views.keys()];
  }
}
