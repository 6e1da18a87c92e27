/**
 * Integration tests for deviceWatcher.ts
 *
 * Runs the whole pipeline (signal sources, debounce, mute monitor,
 * engine, registry, default indicators) against in-process fakes.
 */

import { ConfigError } from '../../src/config.js';
import { DisplayStateChange } from '../../src/core/aggregationEngine.js';
import { DeviceWatcher, WATCHER_EVENTS } from '../../src/core/deviceWatcher.js';
import { DisplayState } from '../../src/core/displayState.js';
import { CAMERA, ORANGE_DIAMOND, RED_DOT } from '../../src/indicators/menuBarIndicator.js';
import { TimerScheduler } from '../../src/media/timerScheduler.js';
import { FakeMediaPlatform } from '../helpers/fakePlatform.js';
import { createFakeHost, FakeHost, RecordingIndicator } from '../helpers/fakeSurfaces.js';

const APP = 'zoom.us';

describe('DeviceWatcher', () => {
  let platform: FakeMediaPlatform;
  let fake: FakeHost;
  let watcher: DeviceWatcher;
  let changes: DisplayStateChange[];

  beforeEach(() => {
    jest.useFakeTimers();
    platform = new FakeMediaPlatform();
    platform.addDevice('camera', 'cam-1', 'FaceTime HD Camera', false);
    platform.addDevice('microphone', 'mic-1', 'Built-in Microphone', false);
    fake = createFakeHost();
    watcher = new DeviceWatcher({ platform, scheduler: new TimerScheduler(), host: fake.host });
    changes = [];
    watcher.on(WATCHER_EVENTS.DISPLAY_STATE_CHANGED, (change: DisplayStateChange) => {
      changes.push(change);
    });
  });

  afterEach(() => {
    watcher.stop();
    jest.useRealTimers();
  });

  function states(): DisplayState[] {
    return changes.map((change) => change.state);
  }

  describe('start', () => {
    test('registers the default indicators and broadcasts the initial state', () => {
      watcher.start();

      expect(watcher.getIndicators().map((indicator) => indicator.name)).toEqual(['menubar', 'border']);
      expect(changes).toEqual([{ state: DisplayState.Idle, previous: null }]);
      expect(fake.trays.trays[0].isInMenuBar()).toBe(false);
      expect(fake.overlays.overlays[0].showing).toBe(false);
    });

    test('is idempotent', () => {
      watcher.start();
      watcher.start();

      expect(watcher.getIndicators()).toHaveLength(2);
      expect(platform.deviceSubscriptionCount('camera')).toBe(1);
      expect(platform.lifecycleSubscriptionCount()).toBe(1);
    });

    test('a failing device snapshot does not stop startup', () => {
      platform.failSnapshots = true;
      platform.failAppRunningQuery = true;

      expect(() => watcher.start()).not.toThrow();
      expect(watcher.isRunning()).toBe(true);
      expect(watcher.getIndicators()).toHaveLength(2);
      expect(platform.deviceSubscriptionCount('camera')).toBe(1);
      expect(platform.lifecycleSubscriptionCount()).toBe(1);
      expect(states()).toEqual([DisplayState.Idle]);

      platform.failSnapshots = false;
      platform.failAppRunningQuery = false;
      platform.setInUse('cam-1', true);
      expect(states()).toEqual([DisplayState.Idle, DisplayState.CameraActive]);
      expect(fake.overlays.overlays[0].showing).toBe(true);
    });

    test('skips default indicators without a host', () => {
      const headless = new DeviceWatcher({ platform, scheduler: new TimerScheduler() });
      headless.start();

      expect(headless.getIndicators()).toEqual([]);
      expect(headless.currentDisplayState()).toBe(DisplayState.Idle);
      headless.stop();
    });

    test('skips the indicators that are disabled', () => {
      const quiet = new DeviceWatcher(
        { platform, scheduler: new TimerScheduler(), host: fake.host },
        { enableMenubar: false }
      );
      quiet.start();

      expect(quiet.getIndicators().map((indicator) => indicator.name)).toEqual(['border']);
      quiet.stop();
    });
  });

  describe('camera', () => {
    beforeEach(() => {
      watcher.start();
      platform.setInUse('cam-1', true);
    });

    test('camera use shows every indicator', () => {
      expect(states()).toEqual([DisplayState.Idle, DisplayState.CameraActive]);
      expect(fake.trays.trays[0].title).toBe(RED_DOT);
      expect(fake.overlays.overlays[0].showing).toBe(true);
      expect(watcher.camerasInUse().map((device) => device.id)).toEqual(['cam-1']);
    });

    test('a stop and restart within the debounce window is never observed', () => {
      platform.setInUse('cam-1', false);
      expect(watcher.currentDisplayState()).toBe(DisplayState.CameraActive);

      jest.advanceTimersByTime(2000);
      platform.setInUse('cam-1', true);
      jest.advanceTimersByTime(10000);

      expect(states()).toEqual([DisplayState.Idle, DisplayState.CameraActive]);
      expect(fake.overlays.overlays[0].showing).toBe(true);
    });

    test('a real stop is observed once the debounce elapses', () => {
      platform.setInUse('cam-1', false);

      jest.advanceTimersByTime(4999);
      expect(fake.overlays.overlays[0].showing).toBe(true);

      jest.advanceTimersByTime(1);
      expect(states()).toEqual([DisplayState.Idle, DisplayState.CameraActive, DisplayState.Idle]);
      expect(fake.overlays.overlays[0].showing).toBe(false);
      expect(fake.trays.trays[0].isInMenuBar()).toBe(false);
    });

    test('a failing re-check keeps the camera shown until the stop is confirmed', () => {
      platform.setInUse('cam-1', false);
      platform.failSnapshots = true;

      jest.advanceTimersByTime(5000);
      expect(states()).toEqual([DisplayState.Idle, DisplayState.CameraActive]);
      expect(watcher.currentDisplayState()).toBe(DisplayState.CameraActive);
      expect(fake.overlays.overlays[0].showing).toBe(true);

      platform.failSnapshots = false;
      jest.advanceTimersByTime(5000);
      expect(states()).toEqual([DisplayState.Idle, DisplayState.CameraActive, DisplayState.Idle]);
      expect(watcher.currentDisplayState()).toBe(DisplayState.Idle);
      expect(fake.overlays.overlays[0].showing).toBe(false);
    });

    test('unplugging an in-use camera updates the state', () => {
      platform.removeDevice('cam-1');
      expect(states()).toEqual([DisplayState.Idle, DisplayState.CameraActive, DisplayState.Idle]);
    });
  });

  describe('microphone and the conferencing app', () => {
    beforeEach(() => {
      watcher.start();
      platform.setInUse('mic-1', true);
      jest.advanceTimersByTime(1000);
    });

    test('microphone use is picked up by polling', () => {
      expect(states()).toEqual([DisplayState.Idle, DisplayState.MicActive]);
      expect(changes[1].instigator?.id).toBe('mic-1');
    });

    test('a muted app hides microphone use until it quits', () => {
      platform.setAppMuted(APP, true);
      platform.launchApp(APP);
      expect(watcher.currentDisplayState()).toBe(DisplayState.Idle);

      platform.terminateApp(APP);
      expect(watcher.currentDisplayState()).toBe(DisplayState.MicActive);

      expect(states()).toEqual([
        DisplayState.Idle,
        DisplayState.MicActive,
        DisplayState.Idle,
        DisplayState.MicActive,
      ]);
    });

    test('unmuting inside the app is picked up on the next poll', () => {
      platform.setAppMuted(APP, true);
      platform.launchApp(APP);
      platform.setAppMuted(APP, false);

      jest.advanceTimersByTime(5000);
      expect(watcher.currentDisplayState()).toBe(DisplayState.MicActive);
      expect(fake.overlays.overlays[0].showing).toBe(true);
    });

    test('the app mute is ignored when not honored', () => {
      watcher.configure({ honorExternalAppMute: false });
      platform.setAppMuted(APP, true);
      platform.launchApp(APP);

      expect(watcher.currentDisplayState()).toBe(DisplayState.MicActive);
      expect(platform.muteQueryCount).toBe(0);
    });
  });

  describe('user mute', () => {
    beforeEach(() => {
      watcher.start();
      platform.setInUse('cam-1', true);
    });

    test('mute hides overlays and marks the menu bar until unmute', () => {
      watcher.mute();

      expect(watcher.isMuted()).toBe(true);
      expect(watcher.currentDisplayState()).toBe(DisplayState.SuppressedActive);
      expect(fake.overlays.overlays[0].showing).toBe(false);
      expect(fake.trays.trays[0].title).toBe(ORANGE_DIAMOND);

      platform.setInUse('mic-1', true);
      jest.advanceTimersByTime(1000);
      expect(fake.overlays.overlays[0].showing).toBe(false);

      watcher.unmute();
      expect(watcher.currentDisplayState()).toBe(DisplayState.BothActive);
      expect(fake.overlays.overlays[0].showing).toBe(true);
      expect(fake.trays.trays[0].title).toBe(RED_DOT);
    });

    test('the menu bar toggle mutes the watcher', () => {
      const menu = fake.trays.trays[0].openMenu();
      expect(menu.map((item) => item.title)).toEqual(['Mute Indicators', `${CAMERA}FaceTime HD Camera`]);

      menu[0].click?.();
      expect(watcher.isMuted()).toBe(true);
      expect(fake.trays.trays[0].openMenu()[0].title).toBe('Unmute Indicators');
    });
  });

  describe('indicators', () => {
    test('a failed creation result is not registered', () => {
      watcher.start();
      expect(watcher.registerIndicator({ success: false, error: 'no display' })).toBe(false);
      expect(watcher.getIndicators()).toHaveLength(2);
    });

    test('an indicator added later is brought up to date', () => {
      watcher.start();
      platform.setInUse('cam-1', true);
      watcher.mute();

      const late = new RecordingIndicator('late');
      expect(watcher.registerIndicator(late)).toBe(true);

      expect(late.calls).toEqual(['mute', 'update']);
      expect(late.updates).toEqual([{ state: DisplayState.SuppressedActive }]);
    });

    test('a throwing indicator does not stop the default ones', () => {
      const broken = new RecordingIndicator('broken');
      broken.throwOn.add('update');
      watcher.registerIndicator(broken);
      watcher.start();

      platform.setInUse('cam-1', true);
      expect(fake.overlays.overlays[0].showing).toBe(true);
    });

    test('a paused indicator misses broadcasts and catches up on resume', () => {
      const paused = new RecordingIndicator('paused');
      watcher.start();
      watcher.registerIndicator(paused);
      watcher.setIndicatorActive(paused, false);
      paused.updates = [];

      platform.setInUse('cam-1', true);
      expect(paused.updates).toEqual([]);

      watcher.setIndicatorActive(paused, true);
      expect(paused.updates).toEqual([{ state: DisplayState.CameraActive }]);
    });

    test('unregistering deletes the indicator', () => {
      watcher.start();
      const [menubar] = watcher.getIndicators();

      expect(watcher.unregisterIndicator(menubar)).toBe(true);
      expect(fake.trays.trays[0].deleted).toBe(true);
      expect(watcher.getIndicators().map((indicator) => indicator.name)).toEqual(['border']);
    });

    test('a display change refreshes overlay placement', () => {
      watcher.start();
      fake.displays.changeWorkArea({ x: 0, y: 0, width: 1920, height: 1080 });

      expect(fake.overlays.overlays[0].frame).toEqual({ x: 0, y: 0, width: 1920, height: 1080 });
    });
  });

  describe('configure', () => {
    test('rejects invalid values and keeps the previous config', () => {
      expect(() => watcher.configure({ cameraOffDebounceSeconds: -5 })).toThrow(ConfigError);
      expect(watcher.getConfig().cameraOffDebounceSeconds).toBe(5);
    });

    test('a zero debounce reports camera stops immediately', () => {
      watcher.configure({ cameraOffDebounceSeconds: 0 });
      watcher.start();
      platform.setInUse('cam-1', true);
      platform.setInUse('cam-1', false);

      expect(states()).toEqual([DisplayState.Idle, DisplayState.CameraActive, DisplayState.Idle]);
    });

    test('turning camera monitoring off while running updates indicators', () => {
      watcher.start();
      platform.setInUse('cam-1', true);

      watcher.configure({ monitorCameras: false });

      expect(states()).toEqual([DisplayState.Idle, DisplayState.CameraActive, DisplayState.Idle]);
      expect(platform.deviceSubscriptionCount('camera')).toBe(0);
    });

    test('fromEnvironment reads WATCHLIGHT_* variables', () => {
      process.env.WATCHLIGHT_CAMERA_OFF_DEBOUNCE_SECONDS = '0';
      try {
        const fromEnv = DeviceWatcher.fromEnvironment({ platform }, undefined, { monitorMics: false });
        expect(fromEnv.getConfig().cameraOffDebounceSeconds).toBe(0);
        expect(fromEnv.getConfig().monitorMics).toBe(false);
      } finally {
        delete process.env.WATCHLIGHT_CAMERA_OFF_DEBOUNCE_SECONDS;
      }
    });
  });

  describe('events', () => {
    test('a throwing listener does not stop other listeners', () => {
      const seen: DisplayState[] = [];
      watcher.removeAllListeners();
      watcher.on(WATCHER_EVENTS.DISPLAY_STATE_CHANGED, () => {
        throw new Error('listener failed');
      });
      watcher.on(WATCHER_EVENTS.DISPLAY_STATE_CHANGED, (change: DisplayStateChange) => {
        seen.push(change.state);
      });

      watcher.start();
      platform.setInUse('cam-1', true);

      expect(seen).toEqual([DisplayState.Idle, DisplayState.CameraActive]);
    });

    test('a once listener is called for the first change only', () => {
      const seen: DisplayState[] = [];
      watcher.once(WATCHER_EVENTS.DISPLAY_STATE_CHANGED, (change: DisplayStateChange) => {
        seen.push(change.state);
      });

      watcher.start();
      platform.setInUse('cam-1', true);
      platform.setInUse('mic-1', true);
      jest.advanceTimersByTime(1000);

      expect(seen).toEqual([DisplayState.Idle]);
      expect(watcher.listenerCount(WATCHER_EVENTS.DISPLAY_STATE_CHANGED)).toBe(1);
      expect(states()).toEqual([DisplayState.Idle, DisplayState.CameraActive, DisplayState.BothActive]);
    });
  });

  describe('stop', () => {
    test('releases everything and is idempotent', () => {
      watcher.start();
      platform.setInUse('cam-1', true);
      platform.setInUse('cam-1', false);

      watcher.stop();
      watcher.stop();

      expect(watcher.isRunning()).toBe(false);
      expect(watcher.getIndicators()).toEqual([]);
      expect(fake.trays.trays[0].deleted).toBe(true);
      expect(fake.overlays.overlays[0].deleted).toBe(true);
      expect(platform.deviceSubscriptionCount('camera')).toBe(0);
      expect(platform.lifecycleSubscriptionCount()).toBe(0);
      expect(fake.displays.listenerCount()).toBe(0);
      expect(jest.getTimerCount()).toBe(0);
    });
  });
});
