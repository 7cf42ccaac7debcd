/**
 * Graph traversal tests
 *
 * Tests:
 * - countConnectedNodes counts along output exec links, start included
 * - Shared nodes and cycles are counted once
 * - isNodeInContext walks input exec links and tests the start node too
 * - Both walks terminate on cycles
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { GraphView, countConnectedNodes, isNodeInContext, isTickEvent } from '@graphlint/core';
import { call, cast, chain, event, eventGraph, link, tickEvent } from '../../helpers/graphBuilder.js';

describe('countConnectedNodes', () => {
  it('should count a straight chain including the start node', () => {
    const tick = tickEvent();
    const a = call('a', 'A');
    const b = call('b', 'B');
    const c = call('c', 'C');
    chain(tick, a, b, c);
    const view = new GraphView(eventGraph([tick, a, b, c]));

    assert.strictEqual(countConnectedNodes(view, tick), 4);
    assert.strictEqual(countConnectedNodes(view, b), 2);
  });

  it('should count a diamond join once', () => {
    const tick = tickEvent();
    const a = call('a', 'A');
    const b = call('b', 'B');
    const c = call('c', 'C');
    link(tick, 'then', a, 'exec');
    link(tick, 'then', b, 'exec');
    chain(a, c);
    chain(b, c);
    const view = new GraphView(eventGraph([tick, a, b, c]));

    assert.strictEqual(countConnectedNodes(view, tick), 4);
  });

  it('should terminate on a cycle', () => {
    const a = call('a', 'A');
    const b = call('b', 'B');
    chain(a, b, a);
    const view = new GraphView(eventGraph([a, b]));

    assert.strictEqual(countConnectedNodes(view, a), 2);
  });

  it('should return 0 for an already visited start node', () => {
    const a = call('a', 'A');
    const view = new GraphView(eventGraph([a]));
    const visited = new Set(['a']);

    assert.strictEqual(countConnectedNodes(view, a, visited), 0);
  });

  it('should ignore links to nodes outside the graph', () => {
    const tick = tickEvent();
    const a = call('a', 'A');
    const outside = call('x', 'X');
    chain(tick, a, outside);
    const view = new GraphView(eventGraph([tick, a]));

    assert.strictEqual(countConnectedNodes(view, tick), 2);
  });
});

describe('isNodeInContext', () => {
  it('should find a tick event upstream', () => {
    const tick = tickEvent();
    const a = call('a', 'A');
    const c = cast('c', 'Cast To Pawn');
    chain(tick, a, c);
    const view = new GraphView(eventGraph([tick, a, c]));

    assert.strictEqual(isNodeInContext(view, c, isTickEvent), true);
  });

  it('should test the start node itself', () => {
    const tick = tickEvent();
    const view = new GraphView(eventGraph([tick]));

    assert.strictEqual(isNodeInContext(view, tick, isTickEvent), true);
  });

  it('should not look downstream', () => {
    const c = cast('c', 'Cast To Pawn');
    const a = call('a', 'A');
    chain(c, a);
    const view = new GraphView(eventGraph([c, a]));

    assert.strictEqual(isNodeInContext(view, c, node => node.id === 'a'), false);
    assert.strictEqual(isNodeInContext(view, a, node => node.id === 'c'), true);
  });

  it('should return false for a cycle without a match', () => {
    const begin = event('begin', 'ReceiveBeginPlay');
    const a = call('a', 'A');
    const c = cast('c', 'Cast To Pawn');
    chain(begin, a, c, a);
    const view = new GraphView(eventGraph([begin, a, c]));

    assert.strictEqual(isNodeInContext(view, c, isTickEvent), false);
  });

  it('should skip nodes already in the visited set', () => {
    const tick = tickEvent();
    const c = cast('c', 'Cast To Pawn');
    chain(tick, c);
    const view = new GraphView(eventGraph([tick, c]));

    assert.strictEqual(isNodeInContext(view, c, isTickEvent, new Set(['tick'])), false);
  });
});
