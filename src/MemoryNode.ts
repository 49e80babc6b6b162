import type { StructuredNode } from './types';
import { Readable } from 'stream';
import * as constants from './constants';
import * as errors from './errors';
import * as traversal from './traversal';

/**
 * A node of the in-memory tree. A node is either a leaf holding contents or a
 * directory owning children, never both. A node that has neither is an empty
 * directory, and reading it yields an empty stream.
 *
 * Children are kept twice: once in insertion order for listing, and once by
 * name for direct lookups. Both collections stay unallocated until the first
 * child is added, so leaves carry no collection at all.
 *
 * Ownership flows from parent to child only. The parent link is used for
 * traversal and removal, and constructing a node with a parent is what
 * registers it under that parent.
 *
 * Mutating the tree from concurrent callers needs external synchronisation.
 */
class MemoryNode implements StructuredNode<MemoryNode> {
  public readonly name: string;
  public readonly parent: MemoryNode | undefined;
  protected children: Array<MemoryNode> | undefined;
  protected childMap: Map<string, MemoryNode> | undefined;
  protected contents: Uint8Array | undefined;
  protected modified: number = Date.now();

  public constructor(parent: MemoryNode | undefined, name: string) {
    this.name = name;
    this.parent = parent;
    if (parent != null) {
      parent.addChild(name, this);
    }
  }

  public get lastModified(): number {
    return this.modified;
  }

  public get size(): number {
    return this.contents?.byteLength ?? 0;
  }

  public isLeaf(): boolean {
    return this.contents != null;
  }

  public getDirectChild(name: string): MemoryNode | undefined {
    return this.childMap?.get(name);
  }

  /**
   * Gets the children in insertion order.
   */
  public getChildren(): Array<MemoryNode> {
    return this.children == null ? [] : [...this.children];
  }

  public findChild(path: string): MemoryNode {
    return traversal.findChild<MemoryNode>(this, path);
  }

  /**
   * Removes `child` from both the name map and the ordered children. The
   * removal only counts as successful if both collections held it.
   */
  public deleteChild(child: MemoryNode): boolean {
    let removedFromMap = false;
    if (this.childMap != null && this.childMap.get(child.name) === child) {
      removedFromMap = this.childMap.delete(child.name);
    }
    let removedFromList = false;
    if (this.children != null) {
      const index = this.children.indexOf(child);
      if (index !== -1) {
        this.children.splice(index, 1);
        removedFromList = true;
      }
    }
    return removedFromMap && removedFromList;
  }

  /**
   * Removes this node from its parent. The root cannot be removed.
   */
  public delete(): boolean {
    return this.parent?.deleteChild(this) ?? false;
  }

  public getContents(): Uint8Array | undefined {
    return this.contents;
  }

  /**
   * Turns this node into a leaf holding `contents`.
   */
  public setContents(contents: Uint8Array): void {
    if (this.children != null && this.children.length > 0) {
      throw new errors.ErrorVFSInvariantViolation(
        `Cannot set contents for non-leaf node ${this}`,
      );
    }
    this.contents = contents;
    this.modified = Date.now();
  }

  public openStream(): Readable {
    return Readable.from([this.contents ?? new Uint8Array(0)]);
  }

  public toString(): string {
    const segments: Array<string> = [];
    for (
      let node: MemoryNode | undefined = this;
      node?.parent != null;
      node = node.parent
    ) {
      segments.unshift(node.name);
    }
    return constants.SEPARATOR + segments.join(constants.SEPARATOR);
  }

  protected addChild(name: string, child: MemoryNode): void {
    if (this.contents != null) {
      throw new errors.ErrorVFSInvariantViolation(
        `Cannot add child ${name} to leaf node ${this}`,
      );
    }
    if (this.childMap?.has(name)) {
      throw new errors.ErrorVFSDuplicateChild(
        `${this} already has a child named ${name}`,
      );
    }
    if (this.children == null) this.children = [];
    if (this.childMap == null) this.childMap = new Map();
    this.children.push(child);
    this.childMap.set(name, child);
    this.modified = Date.now();
  }
}

export default MemoryNode;
