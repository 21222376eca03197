/**
 * Creation and reconciliation of real DOM from view trees.
 *
 * @packageDocumentation
 */

import type { Attribute, Decoder, Dispatch, VElement, VNode } from './types.js';

/** Node.ELEMENT_NODE, without depending on the global */
const ELEMENT_NODE = 1;

/** Listener installed once per element and event name */
interface Binding<Msg> {
  decode: Decoder<Msg>;
  listener: (event: Event) => void;
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

/**
 * Whether two vnodes describe the same DOM node, so the old one can be
 * patched in place.
 */
function sameNode<Msg>(a: VNode<Msg>, b: VNode<Msg>): boolean {
  if (a.key !== b.key) {
    return false;
  }
  if (a.kind === 'text' || b.kind === 'text') {
    return a.kind === b.kind;
  }
  return a.tag === b.tag;
}

/**
 * Renders view trees into a container and keeps the DOM in step with
 * successive trees.
 *
 * @remarks
 * Event listeners are installed once per element and event name; each patch
 * only swaps the decoder they call, so handlers never see a stale message.
 *
 * @typeParam Msg - Messages produced by event decoders
 */
export class Renderer<Msg> {
  private readonly bindings = new WeakMap<Element, Map<string, Binding<Msg>>>();
  private current: { vnode: VNode<Msg>; node: Node } | null = null;

  constructor(
    private readonly container: Element,
    private readonly dispatch: Dispatch<Msg>
  ) {}

  /**
   * Render `vnode`, patching whatever was rendered before.
   */
  render(vnode: VNode<Msg>): Node {
    if (!this.current) {
      const node = this.create(vnode);
      this.container.appendChild(node);
      this.current = { vnode, node };
      return node;
    }

    const node = this.patch(this.current.node, this.current.vnode, vnode);
    this.current = { vnode, node };
    return node;
  }

  /**
   * Build a fresh DOM node for a vnode.
   */
  create(vnode: VNode<Msg>): Node {
    const doc = this.container.ownerDocument;

    if (vnode.kind === 'text') {
      return doc.createTextNode(vnode.text);
    }

    const el = doc.createElement(vnode.tag);
    this.updateAttributes(el, [], vnode.attrs);
    for (const child of vnode.children) {
      el.appendChild(this.create(child));
    }
    return el;
  }

  /**
   * Bring `node`, last rendered from `prev`, in line with `next`.
   *
   * @returns The node now representing `next`; a new node when `prev` and
   * `next` differ in kind, tag or key
   */
  patch(node: Node, prev: VNode<Msg>, next: VNode<Msg>): Node {
    if (prev === next) {
      return node;
    }

    if (!sameNode(prev, next)) {
      const replacement = this.create(next);
      node.parentNode?.replaceChild(replacement, node);
      return replacement;
    }

    if (next.kind === 'text') {
      if (prev.kind !== 'text' || prev.text !== next.text) {
        node.textContent = next.text;
      }
      return node;
    }

    if (prev.kind !== 'element' || !isElement(node)) {
      const replacement = this.create(next);
      node.parentNode?.replaceChild(replacement, node);
      return replacement;
    }

    this.updateAttributes(node, prev.attrs, next.attrs);

    if (prev.keyed && next.keyed) {
      this.patchKeyedChildren(node, prev, next);
    } else {
      this.patchIndexedChildren(node, prev, next);
    }

    return node;
  }

  private updateAttributes(el: Element, prev: readonly Attribute<Msg>[], next: readonly Attribute<Msg>[]): void {
    const prevAttrs = new Map<string, string>();
    const prevProps = new Map<string, string | boolean>();
    for (const a of prev) {
      if (a.kind === 'attr') {
        prevAttrs.set(a.name, a.value);
      } else if (a.kind === 'prop') {
        prevProps.set(a.name, a.value);
      }
    }

    const events = new Map<string, Decoder<Msg>>();

    for (const a of next) {
      switch (a.kind) {
        case 'attr':
          if (prevAttrs.get(a.name) !== a.value || !el.hasAttribute(a.name)) {
            el.setAttribute(a.name, a.value);
          }
          prevAttrs.delete(a.name);
          break;
        case 'prop':
          // Live form state can drift from the tree, so compare with the element
          if (Reflect.get(el, a.name) !== a.value) {
            Reflect.set(el, a.name, a.value);
          }
          prevProps.delete(a.name);
          break;
        case 'event':
          events.set(a.name, a.decode);
          break;
      }
    }

    for (const name of prevAttrs.keys()) {
      el.removeAttribute(name);
    }
    for (const [name, old] of prevProps) {
      Reflect.set(el, name, typeof old === 'boolean' ? false : '');
    }

    this.updateEvents(el, events);
  }

  private updateEvents(el: Element, events: Map<string, Decoder<Msg>>): void {
    let bound = this.bindings.get(el);

    if (!bound) {
      if (events.size === 0) {
        return;
      }
      bound = new Map();
      this.bindings.set(el, bound);
    }

    for (const [name, binding] of bound) {
      if (!events.has(name)) {
        el.removeEventListener(name, binding.listener);
        bound.delete(name);
      }
    }

    for (const [name, decode] of events) {
      const existing = bound.get(name);
      if (existing) {
        existing.decode = decode;
        continue;
      }

      const binding: Binding<Msg> = {
        decode,
        listener: (event: Event) => {
          this.dispatch(binding.decode(event));
        }
      };
      el.addEventListener(name, binding.listener);
      bound.set(name, binding);
    }
  }

  private patchIndexedChildren(el: Element, prev: VElement<Msg>, next: VElement<Msg>): void {
    const nodes = Array.from(el.childNodes);
    const common = Math.min(prev.children.length, next.children.length);

    for (let i = 0; i < common; i++) {
      this.patch(nodes[i], prev.children[i], next.children[i]);
    }

    for (let i = common; i < next.children.length; i++) {
      el.appendChild(this.create(next.children[i]));
    }

    for (let i = common; i < prev.children.length; i++) {
      el.removeChild(nodes[i]);
    }
  }

  private patchKeyedChildren(el: Element, prev: VElement<Msg>, next: VElement<Msg>): void {
    const nodes = Array.from(el.childNodes);
    const nextKeys = new Set(next.children.map((child) => child.key ?? ''));
    const old = new Map<string, { node: Node; vnode: VNode<Msg> }>();

    prev.children.forEach((vnode, i) => {
      const key = vnode.key ?? '';
      if (!nextKeys.has(key) || old.has(key)) {
        el.removeChild(nodes[i]);
        return;
      }
      old.set(key, { node: nodes[i], vnode });
    });

    let cursor: Node | null = el.firstChild;

    for (const vnode of next.children) {
      const key = vnode.key ?? '';
      const match = old.get(key);
      old.delete(key);

      const node = match ? this.patch(match.node, match.vnode, vnode) : this.create(vnode);

      if (node === cursor || (match && match.node === cursor)) {
        // Patched in place, possibly replaced at the same position
        cursor = node.nextSibling;
      } else {
        el.insertBefore(node, cursor);
      }
    }
  }
}
