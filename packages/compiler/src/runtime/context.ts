/**
 * Owner context and globals passed to compiled expressions
 */

import { Atom } from "./atom.js";

export type StateBag = Atom<Record<string, unknown>>;

export type OwnerKind = "trigger" | "show" | "track" | "cue" | "global";

/**
 * Which trigger, show, track or cue an expression belongs to
 */
export type OwnerInfo = {
  readonly kind: OwnerKind;
  readonly id: string;
  readonly name?: string;
};

export type OwnerContext = {
  readonly locals: StateBag;
  readonly owner?: OwnerInfo;
};

export const createOwnerContext = (owner?: OwnerInfo): OwnerContext =>
  owner === undefined
    ? { locals: new Atom<Record<string, unknown>>({}) }
    : { locals: new Atom<Record<string, unknown>>({}), owner };

/**
 * Process-wide state shared by every expression
 */
export const createGlobals = (): StateBag =>
  new Atom<Record<string, unknown>>({});
