/**
 * Unit tests for indicatorRegistry.ts
 */

import { DisplayState } from '../../src/core/displayState.js';
import { IndicatorRegistry } from '../../src/indicators/indicatorRegistry.js';
import { RecordingIndicator } from '../helpers/fakeSurfaces.js';

describe('IndicatorRegistry', () => {
  let registry: IndicatorRegistry;
  let first: RecordingIndicator;
  let second: RecordingIndicator;
  let third: RecordingIndicator;

  beforeEach(() => {
    registry = new IndicatorRegistry();
    first = new RecordingIndicator('first');
    second = new RecordingIndicator('second');
    third = new RecordingIndicator('third');
    registry.register(first);
    registry.register(second);
    registry.register(third);
  });

  test('an indicator throwing from update does not stop the others', () => {
    second.throwOn.add('update');

    expect(() => registry.broadcastUpdate({ state: DisplayState.CameraActive })).not.toThrow();
    expect(first.updates).toEqual([{ state: DisplayState.CameraActive }]);
    expect(third.updates).toEqual([{ state: DisplayState.CameraActive }]);
    expect(second.calls).toEqual(['update']);
  });

  test('broadcasts reach indicators in registration order', () => {
    const order: string[] = [];
    for (const indicator of [first, second, third]) {
      indicator.update = () => {
        order.push(indicator.name);
      };
    }

    registry.broadcastUpdate({ state: DisplayState.Idle });
    expect(order).toEqual(['first', 'second', 'third']);
  });

  test('refresh, mute and unmute are isolated the same way', () => {
    second.throwOn.add('refresh');
    second.throwOn.add('mute');
    second.throwOn.add('unmute');

    registry.broadcastRefresh();
    registry.broadcastMute();
    registry.broadcastUnmute();

    expect(first.calls).toEqual(['refresh', 'mute', 'unmute']);
    expect(third.calls).toEqual(['refresh', 'mute', 'unmute']);
  });

  test('no deduplication: a twice-registered indicator is called twice', () => {
    registry.register(first);
    registry.broadcastRefresh();

    expect(registry.size()).toBe(4);
    expect(first.calls).toEqual(['refresh', 'refresh']);
  });

  test('a failed creation result is not added', () => {
    expect(registry.register({ success: false, error: 'no display' })).toBeNull();
    expect(registry.size()).toBe(3);
  });

  test('a successful creation result adds its indicator', () => {
    const fourth = new RecordingIndicator('fourth');
    expect(registry.register({ success: true, indicator: fourth })).toBe(fourth);
    expect(registry.getIndicators()).toEqual([first, second, third, fourth]);
  });

  test('inactive entries are skipped but stay registered', () => {
    expect(registry.setActive(second, false)).toBe(true);
    registry.broadcastUpdate({ state: DisplayState.MicActive });

    expect(second.calls).toEqual([]);
    expect(registry.size()).toBe(3);

    registry.setActive(second, true);
    registry.broadcastUpdate({ state: DisplayState.Idle });
    expect(second.updates).toEqual([{ state: DisplayState.Idle }]);
  });

  test('setActive on an unknown indicator reports false', () => {
    expect(registry.setActive(new RecordingIndicator('stranger'), false)).toBe(false);
  });

  test('unregister deletes the indicator and removes it', () => {
    expect(registry.unregister(second)).toBe(true);
    expect(second.calls).toEqual(['delete']);
    expect(registry.getIndicators()).toEqual([first, third]);
    expect(registry.unregister(second)).toBe(false);
  });

  test('teardownAll deletes every indicator, isolated, then clears', () => {
    second.throwOn.add('delete');
    registry.setActive(third, false);

    registry.teardownAll();

    expect(first.calls).toEqual(['delete']);
    expect(second.calls).toEqual(['delete']);
    expect(third.calls).toEqual(['delete']);
    expect(registry.size()).toBe(0);
  });

  test('an indicator registering another mid-broadcast does not shift the iteration', () => {
    const late = new RecordingIndicator('late');
    first.update = () => {
      registry.register(late);
    };

    registry.broadcastUpdate({ state: DisplayState.Idle });

    expect(late.calls).toEqual([]);
    expect(third.updates).toEqual([{ state: DisplayState.Idle }]);
  });
});
