// Member blocks: anonymous aggregate inlining, member emission and the empty placeholder

import { DeclarationNode, RenderContext, AggregateNode, COMMENT_PREFIX, TAB } from '../ast/nodes';
import { DeclarationRenderer } from './renderer';
import { flattenQualifiedName } from '../dialect';

export type BlockMode = 'extern' | 'aggregate';

export interface SyntheticCounter {
  next: number;
}

export interface BlockOptions {
  // base of synthetic names: `anon_<name>_<ordinal>`
  name: string;
  mode: BlockMode;
  context: RenderContext;
  counter: SyntheticCounter;
  // leave forward declarations to the prologue
  deferForwards: boolean;
}

export interface BlockResult {
  // aggregate mode: synthetic aggregates that go before the owner's header
  hoisted: string[];
  // indented body lines, `pass` included when nothing was emitted
  body: string[];
}

function isInlinedAnonymous(node: DeclarationNode): boolean {
  return (node.variant === 'struct' || node.variant === 'union' || node.variant === 'enum') && node.isAnonymous;
}

function indent(lines: readonly string[]): string[] {
  return lines.map(line => TAB + line);
}

function references(node: DeclarationNode, key: string): boolean {
  return node.associatedDeclarations().some(cursor => node.index.identityOf(cursor) === key);
}

/**
 * Renders the members of one block. Anonymous aggregates are named first:
 * a typedef naming one directly lends it its name (the first such typedef
 * emits the body), the rest get `anon_<name>_<ordinal>`. In an extern block
 * a synthetic aggregate is emitted right before the first member that uses
 * it; in an aggregate body it is hoisted before the owner's header.
 */
export function renderBlock(renderer: DeclarationRenderer, members: readonly DeclarationNode[], options: BlockOptions): BlockResult {
  const { index } = renderer;
  const names = new Map<string, string>();
  const typedefOwners = new Map<string, string>();
  const anonymous = new Map<string, DeclarationNode>();

  for (const member of members) {
    if (isInlinedAnonymous(member)) {
      anonymous.set(member.key, member);
    }
  }

  for (const member of members) {
    if (member.variant !== 'typedef') {
      continue;
    }
    const target = member.anonymousTarget;
    const key = target ? index.identityOf(target) : undefined;
    if (key !== undefined && anonymous.has(key) && !typedefOwners.has(key)) {
      typedefOwners.set(key, member.key);
      names.set(key, member.name);
    }
  }

  for (const key of anonymous.keys()) {
    if (!names.has(key)) {
      names.set(key, `anon_${options.name}_${options.counter.next++}`);
    }
  }

  const parent = options.context;
  const context: RenderContext = {
    ...parent,
    name: undefined,
    typedef: undefined,
    anonymousName: cursor => names.get(index.identityOf(cursor)) ?? parent.anonymousName?.(cursor)
  };

  const hoisted: string[] = [];
  const body: string[] = [];
  const pending = new Map<string, string[]>();
  let emitted = 0;

  members.forEach((member, position) => {
    if (isInlinedAnonymous(member)) {
      if (typedefOwners.has(member.key)) {
        return;
      }
      const lines = member.lines({ ...context, name: names.get(member.key) });
      if (options.mode === 'aggregate') {
        hoisted.push(...lines);
        return;
      }
      const usedLater = members.slice(position + 1).some(other => !isInlinedAnonymous(other) && references(other, member.key));
      if (usedLater) {
        pending.set(member.key, lines);
      } else {
        body.push(...indent(lines));
        emitted++;
      }
      return;
    }

    for (const [key, lines] of Array.from(pending)) {
      if (references(member, key)) {
        body.push(...indent(lines));
        pending.delete(key);
      }
    }

    if (options.deferForwards && member.isForwardDeclaration) {
      return;
    }

    const reason = member.unsupportedReason();
    if (reason !== undefined) {
      renderer.reportUnsupported(member, reason);
    }

    const lines = memberLines(member, context, typedefOwners, anonymous);
    if (lines.length === 0) {
      return;
    }
    emitted++;

    if (options.mode === 'aggregate' && member.isStaticMethod) {
      for (const line of lines) {
        body.push(TAB + (line.startsWith(COMMENT_PREFIX) ? COMMENT_PREFIX : '') + '@staticmethod', TAB + line);
      }
    } else {
      body.push(...indent(lines));
    }
  });

  for (const lines of pending.values()) {
    body.push(...indent(lines));
  }

  if (emitted === 0) {
    body.push(TAB + 'pass');
  }

  return { hoisted, body };
}

function memberLines(
  member: DeclarationNode,
  context: RenderContext,
  typedefOwners: ReadonlyMap<string, string>,
  anonymous: ReadonlyMap<string, DeclarationNode>
): string[] {
  if (member.variant === 'typedef') {
    const target = member.anonymousTarget;
    const key = target ? member.index.identityOf(target) : undefined;
    const owned = key !== undefined ? anonymous.get(key) : undefined;
    if (key !== undefined && owned && typedefOwners.get(key) === member.key) {
      return owned.lines({ ...context, name: member.name, typedef: true });
    }
  }
  return member.lines(context);
}

/**
 * Body of a struct, class or union: hoisted synthetic aggregates, the
 * header, then the indented members.
 */
export function renderAggregateBody(
  renderer: DeclarationRenderer,
  owner: AggregateNode,
  name: string,
  header: string,
  context: RenderContext
): string[] {
  const { hoisted, body } = renderBlock(renderer, owner.members, {
    name: owner.isAnonymous ? name : flattenQualifiedName(owner.qualifiedAddress),
    mode: 'aggregate',
    context,
    counter: { next: 0 },
    deferForwards: false
  });
  return [...hoisted, header, ...body];
}
