/**
 * OrphanNodeDetector Tests
 *
 * Tests:
 * - Impure nodes with no connected exec pin (High)
 * - Pure nodes with no wired data output (Low)
 * - Entry points, macro instances, tunnels and input bindings are skipped
 * - Pure-node deny lists
 * - Interface programs produce nothing
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { OrphanNodeDetector, SEVERITY } from '@graphlint/core';
import {
  call,
  chain,
  contextFor,
  customEvent,
  event,
  eventGraph,
  functionEntry,
  generic,
  graph,
  link,
  macroInstance,
  makePin,
  program,
  pureNode,
  tickEvent,
  tunnel,
} from '../../../helpers/graphBuilder.js';

const PATH = '/Game/BP_Door.BP_Door';

describe('OrphanNodeDetector', () => {
  const detector = new OrphanNodeDetector();

  it('should report an exec node with no exec connections', () => {
    const door = program(PATH, [eventGraph([call('c1', 'PrintString')])]);

    assert.deepStrictEqual(detector.detect(contextFor(door)), [{
      type: 'OrphanNode',
      programPath: PATH,
      nodeName: 'PrintString',
      description: "Execution node 'PrintString' is not connected to any execution flow (orphan node)",
      severity: SEVERITY.HIGH,
      nodeId: 'c1',
      graphName: 'EventGraph',
    }]);
  });

  it('should accept nodes wired into the execution flow', () => {
    const tick = tickEvent();
    const a = call('a', 'Move');
    const b = call('b', 'Rotate');
    chain(tick, a, b);

    assert.deepStrictEqual(detector.detect(contextFor(program(PATH, [eventGraph([tick, a, b])]))), []);
  });

  it('should report a pure node whose output is unused', () => {
    const door = program(PATH, [eventGraph([pureNode('p1', 'Add')])]);

    assert.deepStrictEqual(detector.detect(contextFor(door)), [{
      type: 'OrphanNode',
      programPath: PATH,
      nodeName: 'Add',
      description: "Pure node 'Add' has no output connections",
      severity: SEVERITY.LOW,
      nodeId: 'p1',
      graphName: 'EventGraph',
    }]);
  });

  it('should accept a pure node feeding another node', () => {
    const add = pureNode('p1', 'Add');
    const print = call('c1', 'PrintString', { pins: [makePin('InString', 'input', 'data')] });
    const begin = event('e1', 'ReceiveBeginPlay');
    chain(begin, print);
    link(add, 'ReturnValue', print, 'InString');

    assert.deepStrictEqual(detector.detect(contextFor(program(PATH, [eventGraph([begin, print, add])]))), []);
  });

  it('should skip pure nodes on the deny lists', () => {
    const door = program(PATH, [eventGraph([
      pureNode('p1', 'Make Vector'),
      pureNode('p2', 'Reroute Node'),
      generic('p3', '5', [makePin('Value', 'output', 'data')], { nodeClass: 'K2Node_Literal' }),
    ])]);

    assert.deepStrictEqual(detector.detect(contextFor(door)), []);
  });

  it('should skip entry points, macro instances and tunnels', () => {
    const fn = graph('OpenDoor', [functionEntry('f1', 'OpenDoor')], 'function');
    const door = program(PATH, [
      eventGraph([
        event('e1', 'ReceiveBeginPlay'),
        customEvent('e2', 'OnUnlocked'),
        macroInstance('m1', 'DoOnce'),
        tunnel('t1'),
      ]),
      fn,
    ]);

    assert.deepStrictEqual(detector.detect(contextFor(door)), []);
  });

  it('should skip input bindings and the construction script', () => {
    const execPins = () => [makePin('exec', 'input', 'exec'), makePin('then', 'output', 'exec')];
    const door = program(PATH, [eventGraph([
      generic('i1', 'Input Action Jump', execPins()),
      generic('i2', 'Any Key', execPins(), { nodeClass: 'K2Node_InputKey' }),
      generic('cs', 'Construction Script', execPins()),
    ])]);

    assert.deepStrictEqual(detector.detect(contextFor(door)), []);
  });

  it('should ignore impure nodes without exec pins', () => {
    const door = program(PATH, [eventGraph([
      generic('g1', 'Comment', [], { pure: false }),
    ])]);

    assert.deepStrictEqual(detector.detect(contextFor(door)), []);
  });

  it('should produce nothing for interface programs', () => {
    const usable = program('/Game/BPI_Usable.BPI_Usable', [eventGraph([call('c1', 'PrintString')])]);

    assert.deepStrictEqual(detector.detect(contextFor(usable)), []);
  });
});
