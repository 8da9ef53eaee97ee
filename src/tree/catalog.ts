/**
 * Catalog root node
 *
 * A Catalog is the top of a tree of catalog entries. It always stays a root:
 * it can hold children but can never be attached below another node.
 */

import { RootNodeError } from '../core/errors.js';
import { CatalogNode } from './node.js';

export class Catalog extends CatalogNode {
  name: string;

  constructor(name = 'default Catalog') {
    super();
    this.name = name;
  }

  override setParent(newParent: CatalogNode | undefined): void {
    if (newParent !== undefined) {
      throw new RootNodeError(`Catalog ${this.name} cannot have a parent`);
    }
  }

  override matches(selector: string): boolean {
    return selector === this.name || super.matches(selector);
  }

  override describe(): string {
    return `Catalog ${this.name}`;
  }
}
