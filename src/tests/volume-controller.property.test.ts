/**
 * Property-based tests for the Volume Controller
 */
import * as fc from 'fast-check';
import {
  AdapterError,
  ControllerError,
  PactlAudioAdapter,
  parseLevel,
  VolumeControllerImpl
} from '../services';
import {
  createMockAdapter,
  FakeAudioSystem,
  percentArbitrary,
  propertyTestConfig,
  stepArbitrary,
  volumeStateArbitrary
} from './setup';

function createController(audio: FakeAudioSystem, step?: number): VolumeControllerImpl {
  return new VolumeControllerImpl(new PactlAudioAdapter(audio), step === undefined ? {} : { step });
}

describe('Volume Controller Property Tests', () => {
  test('setLevel then getStatus round-trips every level', async () => {
    await fc.assert(
      fc.asyncProperty(volumeStateArbitrary, percentArbitrary, async (initial, level) => {
        const controller = createController(new FakeAudioSystem(initial));

        const afterSet = await controller.setLevel(level);
        const status = await controller.getStatus();

        expect(afterSet.percent).toBe(level);
        expect(status).toEqual({ percent: level, muted: initial.muted });
      }),
      propertyTestConfig
    );
  });

  test('increase moves up by step, never past 100', async () => {
    await fc.assert(
      fc.asyncProperty(volumeStateArbitrary, stepArbitrary, async (initial, step) => {
        const controller = createController(new FakeAudioSystem(initial), step);

        const result = await controller.increase();

        expect(result).toEqual({ percent: Math.min(100, initial.percent + step), muted: initial.muted });
      }),
      propertyTestConfig
    );
  });

  test('decrease moves down by step, never below 0', async () => {
    await fc.assert(
      fc.asyncProperty(volumeStateArbitrary, stepArbitrary, async (initial, step) => {
        const controller = createController(new FakeAudioSystem(initial), step);

        const result = await controller.decrease();

        expect(result).toEqual({ percent: Math.max(0, initial.percent - step), muted: initial.muted });
      }),
      propertyTestConfig
    );
  });

  test('toggleMute twice restores the original mute flag', async () => {
    await fc.assert(
      fc.asyncProperty(volumeStateArbitrary, async (initial) => {
        const controller = createController(new FakeAudioSystem(initial));

        const once = await controller.toggleMute();
        const twice = await controller.toggleMute();

        expect(once).toEqual({ percent: initial.percent, muted: !initial.muted });
        expect(twice).toEqual(initial);
      }),
      propertyTestConfig
    );
  });

  test('setLevel clamps any integer into 0-100', async () => {
    await fc.assert(
      fc.asyncProperty(fc.integer({ min: -1000, max: 1000 }), async (level) => {
        const controller = createController(new FakeAudioSystem());

        const result = await controller.setLevel(level);

        expect(result.percent).toBe(Math.max(0, Math.min(100, level)));
      }),
      propertyTestConfig
    );
  });

  test('non-integer input never reaches the audio system', async () => {
    const nonInteger = fc.oneof(
      fc.string().filter((text) => !/^\s*[+-]?\d+\s*$/.test(text)),
      fc.double({ noInteger: true }),
      fc.boolean(),
      fc.constant(null),
      fc.constant(undefined),
      fc.array(fc.integer()),
      fc.object()
    );

    await fc.assert(
      fc.asyncProperty(nonInteger, async (value) => {
        const audio = new FakeAudioSystem();
        const controller = createController(audio);

        await expect(controller.setLevel(value)).rejects.toMatchObject({ kind: 'InvalidInput' });
        expect(audio.calls).toHaveLength(0);
      }),
      propertyTestConfig
    );
  });
});

describe('Volume Controller', () => {
  test('step 5 from 50% unmuted increases to 55%', async () => {
    const audio = new FakeAudioSystem({ percent: 50, muted: false });
    const controller = createController(audio);

    await expect(controller.increase()).resolves.toEqual({ percent: 55, muted: false });
    expect(audio.percent).toBe(55);
  });

  test('defaults to a step of 5', () => {
    expect(createController(new FakeAudioSystem()).step).toBe(5);
  });

  test('increase at 100% is a no-op without a mutating command', async () => {
    const audio = new FakeAudioSystem({ percent: 100, muted: true });
    const controller = createController(audio);

    await expect(controller.increase()).resolves.toEqual({ percent: 100, muted: true });
    expect(audio.mutatingCalls()).toHaveLength(0);
  });

  test('decrease at 0% is a no-op without a mutating command', async () => {
    const audio = new FakeAudioSystem({ percent: 0, muted: false });
    const controller = createController(audio);

    await expect(controller.decrease()).resolves.toEqual({ percent: 0, muted: false });
    expect(audio.mutatingCalls()).toHaveLength(0);
  });

  test('setLevel(150) clamps to 100 and setLevel(-10) clamps to 0', async () => {
    const audio = new FakeAudioSystem();
    const controller = createController(audio);

    await expect(controller.setLevel(150)).resolves.toMatchObject({ percent: 100 });
    await expect(controller.setLevel(-10)).resolves.toMatchObject({ percent: 0 });
    expect(audio.mutatingCalls().map((call) => call.args[2])).toEqual(['100%', '0%']);
  });

  test('setLevel("abc") fails with InvalidInput and runs nothing', async () => {
    const audio = new FakeAudioSystem();
    const controller = createController(audio);

    const error = await controller.setLevel('abc').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ControllerError);
    expect(error).toMatchObject({ kind: 'InvalidInput', message: 'percent must be an integer, got "abc"', statusCode: 400 });
    expect(audio.calls).toHaveLength(0);
  });

  test('setLevel accepts integer strings', async () => {
    const controller = createController(new FakeAudioSystem());

    await expect(controller.setLevel(' 42 ')).resolves.toMatchObject({ percent: 42 });
  });

  test('mutations are followed by a fresh read of the sink', async () => {
    const adapter = createMockAdapter({ percent: 50, muted: false });
    // The daemon applies something other than what was asked
    adapter.setVolume.mockImplementationOnce(async () => undefined);
    const controller = new VolumeControllerImpl(adapter, { step: 10 });

    const result = await controller.increase();

    expect(adapter.setVolume).toHaveBeenCalledWith(60);
    expect(adapter.getState).toHaveBeenCalledTimes(2);
    expect(result).toEqual({ percent: 50, muted: false });
  });

  test('toggleMute sets the negation of the freshly read flag', async () => {
    const adapter = createMockAdapter({ percent: 30, muted: true });
    const controller = new VolumeControllerImpl(adapter);

    await expect(controller.toggleMute()).resolves.toEqual({ percent: 30, muted: false });
    expect(adapter.setMute).toHaveBeenCalledWith(false);
  });

  test('a failing query surfaces as CommandFailed', async () => {
    const audio = new FakeAudioSystem();
    audio.failNext(
      new AdapterError('Audio command "pactl" failed with exit code 1', 'CommandFailed', 'Check the daemon', {
        command: 'pactl',
        exitCode: 1
      })
    );
    const controller = createController(audio);

    await expect(controller.getStatus()).rejects.toMatchObject({
      name: 'ControllerError',
      kind: 'CommandFailed',
      message: 'Audio command "pactl" failed with exit code 1',
      troubleshooting: 'Check the daemon',
      statusCode: 500
    });

    // The next call is unaffected
    await expect(controller.getStatus()).resolves.toEqual({ percent: 50, muted: false });
  });

  test('garbage output surfaces as ParseFailure, never a fabricated state', async () => {
    const audio = new FakeAudioSystem();
    audio.printNext('garbage text');
    const controller = createController(audio);

    await expect(controller.getStatus()).rejects.toMatchObject({ kind: 'ParseFailure' });
  });

  test('a timeout while setting is reported as Timeout and skips the re-read', async () => {
    const audio = new FakeAudioSystem({ percent: 20, muted: false });
    const controller = createController(audio);
    // get-sink-volume and get-sink-mute succeed, set-sink-volume times out
    const timeout = new AdapterError('Audio command "pactl" timed out after 3000ms', 'Timeout', 'test');
    const run = audio.run.bind(audio);
    let invocation = 0;
    jest.spyOn(audio, 'run').mockImplementation(async (command, args) => {
      invocation++;
      if (invocation === 3) throw timeout;
      return run(command, args);
    });

    await expect(controller.increase()).rejects.toMatchObject({ kind: 'Timeout' });
    expect(invocation).toBe(3);
  });

  test('unexpected errors are wrapped without leaking their message', async () => {
    const adapter = createMockAdapter();
    adapter.getState.mockRejectedValueOnce(new TypeError('cannot read properties of undefined'));
    const controller = new VolumeControllerImpl(adapter);

    await expect(controller.getStatus()).rejects.toMatchObject({
      kind: 'CommandFailed',
      message: 'Unexpected audio control error'
    });
  });

  test('rejects a step that is not a positive integer', () => {
    const adapter = createMockAdapter();
    expect(() => new VolumeControllerImpl(adapter, { step: 0 })).toThrow('Volume step must be a positive integer, got 0');
    expect(() => new VolumeControllerImpl(adapter, { step: 2.5 })).toThrow('Volume step must be a positive integer, got 2.5');
  });
});

describe('parseLevel', () => {
  test('accepts integral numbers and signed digit strings', () => {
    expect(parseLevel(70)).toBe(70);
    expect(parseLevel(-10)).toBe(-10);
    expect(parseLevel('+15')).toBe(15);
    expect(parseLevel('007')).toBe(7);
  });

  test('rejects fractions, unsafe integers and numeric-looking strings', () => {
    for (const value of [50.5, Number.MAX_SAFE_INTEGER + 1, '12.5', '1e2', '', ' ', '0x10', true]) {
      expect(() => parseLevel(value)).toThrow(ControllerError);
    }
  });
});
