/**
 * Flowsheet graph implementation for SFILES
 */

import { cloneTags, emptyTags, freezeTags, isValidUnitType } from './tag-rules.js';
import type { StreamKind, StreamTags } from './types.js';

export class UnitOperation {
  /**
   * A process unit instance (feed, reactor, heat exchanger, ...).
   */

  public readonly id: number;
  public readonly type: string;
  public index: number;
  public subIndex: number | null;

  constructor(id: number, type: string, index: number, subIndex: number | null = null) {
    this.id = id;
    this.type = type;
    this.index = index;
    this.subIndex = subIndex;
  }

  get name(): string {
    return unitName(this.type, this.index, this.subIndex);
  }
}

export class Stream {
  /**
   * A directed material or signal connection between two units.
   */

  public readonly id: number;
  public src: number;
  public dst: number;
  public readonly kind: StreamKind;
  public tags: StreamTags;

  constructor(id: number, src: number, dst: number, kind: StreamKind, tags: StreamTags) {
    this.id = id;
    this.src = src;
    this.dst = dst;
    this.kind = kind;
    this.tags = tags;
  }
}

export interface UnitNumbering {
  index: number;
  subIndex: number | null;
}

export function unitName(type: string, index: number, subIndex: number | null): string {
  return subIndex === null ? `${type}-${index}` : `${type}-${index}/${subIndex}`;
}

export class FlowsheetGraph {
  /**
   * A process flowsheet.
   *
   * Units and streams live in an arena addressed by small integer ids that
   * are never reused, so streams reference units by id and removal leaves
   * every other id stable. Iteration follows insertion order.
   */

  private _units: Map<number, UnitOperation> = new Map();
  private _streams: Map<number, Stream> = new Map();
  private _outList: Map<number, number[]> = new Map();
  private _inList: Map<number, number[]> = new Map();
  private _names: Map<string, number> = new Map();
  private _nextUnitId = 0;
  private _nextStreamId = 0;
  private _frozen = false;

  get size(): number {
    return this._units.size;
  }

  get streamCount(): number {
    return this._streams.size;
  }

  get isFrozen(): boolean {
    return this._frozen;
  }

  /**
   * Forbids further mutation. Parsed graphs are handed out frozen so that
   * readers can rely on a stable view; units, streams and their tags are
   * frozen with the graph. Use {@link clone} for an editable copy.
   */
  freeze(): this {
    this._frozen = true;
    for (const unit of this._units.values()) {
      Object.freeze(unit);
    }
    for (const stream of this._streams.values()) {
      freezeTags(stream.tags);
      Object.freeze(stream);
    }
    return this;
  }

  hasUnit(id: number): boolean {
    return this._units.has(id);
  }

  getUnit(id: number): UnitOperation {
    const unit = this._units.get(id);
    if (!unit) {
      throw new Error(`No unit with id ${id}`);
    }
    return unit;
  }

  getUnits(): UnitOperation[] {
    return [...this._units.values()];
  }

  findUnit(name: string): UnitOperation | null {
    const id = this._names.get(name);
    return id === undefined ? null : this.getUnit(id);
  }

  getStream(id: number): Stream {
    const stream = this._streams.get(id);
    if (!stream) {
      throw new Error(`No stream with id ${id}`);
    }
    return stream;
  }

  getStreams(kind?: StreamKind): Stream[] {
    const streams = [...this._streams.values()];
    return kind ? streams.filter(s => s.kind === kind) : streams;
  }

  getOutStreams(unitId: number, kind?: StreamKind): Stream[] {
    return this._adjacent(this._outList, unitId, kind);
  }

  getInStreams(unitId: number, kind?: StreamKind): Stream[] {
    return this._adjacent(this._inList, unitId, kind);
  }

  /**
   * Adds a unit. Without an index the next free index for the type is used.
   */
  addUnit(type: string, index?: number, subIndex: number | null = null): UnitOperation {
    this._checkMutable();
    if (!isValidUnitType(type)) {
      throw new Error(`Invalid unit type: '${type}'`);
    }

    const unitIndex = index ?? this._nextIndex(type);
    this._checkNumbering(unitIndex, subIndex);

    const name = unitName(type, unitIndex, subIndex);
    if (this._names.has(name)) {
      throw new Error(`Duplicate unit: ${name}`);
    }

    const unit = new UnitOperation(this._nextUnitId++, type, unitIndex, subIndex);
    this._units.set(unit.id, unit);
    this._outList.set(unit.id, []);
    this._inList.set(unit.id, []);
    this._names.set(name, unit.id);
    return unit;
  }

  addStream(
    src: number,
    dst: number,
    kind: StreamKind = 'material',
    tags: StreamTags = emptyTags()
  ): Stream {
    this._checkMutable();
    this.getUnit(src);
    this.getUnit(dst);

    const stream = new Stream(this._nextStreamId++, src, dst, kind, tags);
    this._streams.set(stream.id, stream);
    this._adjacency(this._outList, src).push(stream.id);
    this._adjacency(this._inList, dst).push(stream.id);
    return stream;
  }

  removeStream(id: number): void {
    this._checkMutable();
    const stream = this.getStream(id);
    this._detach(stream);
    this._streams.delete(id);
  }

  removeUnit(id: number): void {
    this._checkMutable();
    const unit = this.getUnit(id);
    for (const stream of [...this.getOutStreams(id), ...this.getInStreams(id)]) {
      if (this._streams.has(stream.id)) {
        this.removeStream(stream.id);
      }
    }
    this._units.delete(id);
    this._outList.delete(id);
    this._inList.delete(id);
    this._names.delete(unit.name);
  }

  /**
   * Moves one or both ends of a stream to other units, keeping its id,
   * kind and tags.
   */
  redirectStream(id: number, ends: { src?: number; dst?: number }): Stream {
    this._checkMutable();
    const stream = this.getStream(id);
    const src = ends.src ?? stream.src;
    const dst = ends.dst ?? stream.dst;
    this.getUnit(src);
    this.getUnit(dst);

    this._detach(stream);
    stream.src = src;
    stream.dst = dst;
    this._adjacency(this._outList, src).push(stream.id);
    this._adjacency(this._inList, dst).push(stream.id);
    return stream;
  }

  /**
   * Renumbers several units at once. Only the final numbering has to be
   * unique, so indices may be swapped in a single call.
   */
  relabel(numbering: Map<number, UnitNumbering>): void {
    this._checkMutable();
    for (const id of numbering.keys()) {
      this.getUnit(id);
    }
    const names = new Map<string, number>();

    for (const unit of this._units.values()) {
      const next = numbering.get(unit.id) ?? { index: unit.index, subIndex: unit.subIndex };
      this._checkNumbering(next.index, next.subIndex);
      const name = unitName(unit.type, next.index, next.subIndex);
      if (names.has(name)) {
        throw new Error(`Duplicate unit after relabelling: ${name}`);
      }
      names.set(name, unit.id);
    }

    for (const [id, next] of numbering) {
      const unit = this.getUnit(id);
      unit.index = next.index;
      unit.subIndex = next.subIndex;
    }
    this._names = names;
  }

  /**
   * Returns an unfrozen deep copy that keeps every unit and stream id.
   */
  clone(): FlowsheetGraph {
    const copy = new FlowsheetGraph();
    for (const unit of this._units.values()) {
      const cloned = new UnitOperation(unit.id, unit.type, unit.index, unit.subIndex);
      copy._units.set(cloned.id, cloned);
      copy._outList.set(cloned.id, []);
      copy._inList.set(cloned.id, []);
      copy._names.set(cloned.name, cloned.id);
    }
    for (const stream of this._streams.values()) {
      const cloned = new Stream(stream.id, stream.src, stream.dst, stream.kind, cloneTags(stream.tags));
      copy._streams.set(cloned.id, cloned);
      copy._adjacency(copy._outList, cloned.src).push(cloned.id);
      copy._adjacency(copy._inList, cloned.dst).push(cloned.id);
    }
    copy._nextUnitId = this._nextUnitId;
    copy._nextStreamId = this._nextStreamId;
    return copy;
  }

  private _nextIndex(type: string): number {
    let max = 0;
    for (const unit of this._units.values()) {
      if (unit.type === type && unit.index > max) {
        max = unit.index;
      }
    }
    return max + 1;
  }

  private _checkNumbering(index: number, subIndex: number | null): void {
    if (!Number.isInteger(index) || index < 1) {
      throw new Error(`Unit index must be a positive integer: ${index}`);
    }
    if (subIndex !== null && (!Number.isInteger(subIndex) || subIndex < 1)) {
      throw new Error(`Unit sub-index must be a positive integer: ${subIndex}`);
    }
  }

  private _checkMutable(): void {
    if (this._frozen) {
      throw new Error('Flowsheet graph is frozen');
    }
  }

  private _adjacency(lists: Map<number, number[]>, unitId: number): number[] {
    const list = lists.get(unitId);
    if (!list) {
      throw new Error(`No unit with id ${unitId}`);
    }
    return list;
  }

  private _adjacent(lists: Map<number, number[]>, unitId: number, kind?: StreamKind): Stream[] {
    const streams = this._adjacency(lists, unitId).map(id => this.getStream(id));
    return kind ? streams.filter(s => s.kind === kind) : streams;
  }

  private _detach(stream: Stream): void {
    const out = this._adjacency(this._outList, stream.src);
    out.splice(out.indexOf(stream.id), 1);
    const inn = this._adjacency(this._inList, stream.dst);
    inn.splice(inn.indexOf(stream.id), 1);
  }
}
