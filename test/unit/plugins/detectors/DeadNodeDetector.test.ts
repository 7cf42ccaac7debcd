/**
 * DeadNodeDetector Tests
 *
 * Tests:
 * - Unread variable reads and undeclared-use variables
 * - Custom events never called or bound
 * - Lifecycle, interface and component-bound events are never reported
 * - Event dispatchers bound or called anywhere in the scan
 * - Cross-program references through the shared registry
 * - Repeat runs with fresh registries give identical results
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { DeadNodeDetector, ResourceRegistryImpl, SEVERITY } from '@graphlint/core';
import {
  call,
  componentBoundEvent,
  contextFor,
  customEvent,
  delegate,
  event,
  eventGraph,
  link,
  makePin,
  program,
  variableGet,
  variableSet,
} from '../../../helpers/graphBuilder.js';

const PATH = '/Game/BP_Hero.BP_Hero';

describe('DeadNodeDetector', () => {
  const detector = new DeadNodeDetector();

  describe('variables', () => {
    it('should report a declared variable nothing reads or writes', () => {
      const hero = program(PATH, [eventGraph([])], {
        variables: [{ name: 'Health', typeTag: 'float' }],
      });

      const issues = detector.detect(contextFor(hero));

      assert.deepStrictEqual(issues, [{
        type: 'DeadNode',
        programPath: PATH,
        nodeName: 'Health',
        description: "Blueprint variable 'Health' is declared but never used",
        severity: SEVERITY.LOW,
      }]);
    });

    it('should report an unwired read before the declaration', () => {
      const hero = program(PATH, [eventGraph([variableGet('g1', 'Ammo')])], {
        variables: [{ name: 'Ammo', typeTag: 'int' }],
      });

      const issues = detector.detect(contextFor(hero));

      assert.deepStrictEqual(issues.map(i => i.description), [
        "Variable 'Ammo' is retrieved but never used",
        "Blueprint variable 'Ammo' is declared but never used",
      ]);
      assert.strictEqual(issues[0].nodeId, 'g1');
      assert.strictEqual(issues[0].graphName, 'EventGraph');
      assert.strictEqual(issues[1].nodeId, undefined);
    });

    it('should accept wired reads and any write', () => {
      const speed = variableGet('g1', 'Speed');
      const print = call('c1', 'PrintString', { pins: [makePin('InString', 'input', 'data')] });
      link(speed, 'Speed', print, 'InString');
      const hero = program(PATH, [eventGraph([speed, print, variableSet('s1', 'Ammo')])], {
        variables: [
          { name: 'Speed', typeTag: 'float' },
          { name: 'Ammo', typeTag: 'int' },
        ],
      });

      assert.deepStrictEqual(detector.detect(contextFor(hero)), []);
    });
  });

  describe('events', () => {
    it('should report a custom event nobody calls', () => {
      const hero = program(PATH, [eventGraph([customEvent('e1', 'OnSpawned')])]);

      const issues = detector.detect(contextFor(hero));

      assert.deepStrictEqual(issues, [{
        type: 'DeadNode',
        programPath: PATH,
        nodeName: 'OnSpawned',
        description: "Custom event 'OnSpawned' is defined but never called",
        severity: SEVERITY.LOW,
        nodeId: 'e1',
        graphName: 'EventGraph',
      }]);
    });

    it('should accept a custom event called in the same program', () => {
      const hero = program(PATH, [eventGraph([customEvent('e1', 'OnSpawned'), call('c1', 'OnSpawned')])]);

      assert.deepStrictEqual(detector.detect(contextFor(hero)), []);
    });

    it('should skip lifecycle, interface and component-bound events', () => {
      const hero = program(PATH, [eventGraph([
        event('e1', 'ReceiveBeginPlay'),
        event('e2', 'OnInteract', { fromInterface: true }),
        componentBoundEvent('e3', 'OnComponentHit', 'Mesh'),
      ])]);

      assert.deepStrictEqual(detector.detect(contextFor(hero)), []);
    });

    it('should report a plain event that is neither lifecycle nor interface', () => {
      const hero = program(PATH, [eventGraph([event('e1', 'OnLanded')])]);

      assert.deepStrictEqual(
        detector.detect(contextFor(hero)).map(i => i.description),
        ["Custom event 'OnLanded' is defined but never called"]
      );
    });

    it('should accept a custom event bound to a delegate', () => {
      const handler = customEvent('e1', 'HandleDeath');
      const bind = delegate('DelegateBind', 'b1', 'OnDied');
      link(handler, 'OutputDelegate', bind, 'Delegate');
      const hero = program(PATH, [eventGraph([handler, bind])], {
        variables: [{ name: 'OnDied', typeTag: 'delegate', isMulticastDelegate: true }],
      });

      assert.deepStrictEqual(detector.detect(contextFor(hero)), []);
    });
  });

  describe('event dispatchers', () => {
    it('should report a dispatcher nothing binds or calls', () => {
      const hero = program(PATH, [eventGraph([delegate('DelegateCall', 'd1', 'OnDied')])], {
        variables: [
          { name: 'OnDied', typeTag: 'delegate', isMulticastDelegate: true },
          { name: 'OnScored', typeTag: 'delegate', isMulticastDelegate: true },
        ],
      });

      const issues = detector.detect(contextFor(hero));

      assert.deepStrictEqual(issues.map(i => i.description), [
        "Event Dispatcher 'OnScored' is declared but never used",
      ]);
    });

    it('should accept a dispatcher referenced by another program in the same scan', () => {
      const resources = new ResourceRegistryImpl();
      const hud = program('/Game/UI/BP_Hud.BP_Hud', [eventGraph([delegate('DelegateBind', 'b1', 'OnScored')])]);
      const hero = program(PATH, [eventGraph([])], {
        variables: [{ name: 'OnScored', typeTag: 'delegate', isMulticastDelegate: true }],
      });

      detector.detect(contextFor(hud, { resources }));

      assert.deepStrictEqual(detector.detect(contextFor(hero, { resources })), []);
    });
  });

  describe('cross-program references', () => {
    it('should accept an event called from a program analyzed earlier', () => {
      const resources = new ResourceRegistryImpl();
      const alarm = program('/Game/BP_Alarm.BP_Alarm', [eventGraph([call('c1', 'OnAlarm')])]);
      const guard = program('/Game/BP_Guard.BP_Guard', [eventGraph([customEvent('e1', 'OnAlarm')])]);

      detector.detect(contextFor(alarm, { resources }));

      assert.deepStrictEqual(detector.detect(contextFor(guard, { resources })), []);
    });

    it('should not see references from an earlier scan', () => {
      const alarm = program('/Game/BP_Alarm.BP_Alarm', [eventGraph([call('c1', 'OnAlarm')])]);
      const guard = program('/Game/BP_Guard.BP_Guard', [eventGraph([customEvent('e1', 'OnAlarm')])]);

      detector.detect(contextFor(alarm, { resources: new ResourceRegistryImpl() }));
      const issues = detector.detect(contextFor(guard, { resources: new ResourceRegistryImpl() }));

      assert.strictEqual(issues.length, 1);
    });

    it('should give identical results on repeat runs with fresh registries', () => {
      const hero = program(PATH, [eventGraph([customEvent('e1', 'OnSpawned'), variableGet('g1', 'Ammo')])], {
        variables: [{ name: 'Ammo', typeTag: 'int' }, { name: 'Armor', typeTag: 'int' }],
      });

      const first = detector.detect(contextFor(hero));
      const second = detector.detect(contextFor(hero));

      assert.strictEqual(first.length, 4);
      assert.deepStrictEqual(second, first);
    });
  });
});
