import { describe, it, expect, beforeEach } from 'vitest';
import { PlaybackStateMachine, type TriggerResult } from '../../src/services/playback-state-machine.js';
import { createGroup } from '../../src/services/group-catalog.js';
import { createGlobalState, toggleStack } from '../../src/services/global-state.js';
import { ValidationError } from '../../src/utils/errors.js';
import type { Group } from '../../src/types/soundboard.js';
import { FakeSoundHandle, RecordingLogger } from '../helpers.js';

describe('PlaybackStateMachine', () => {
  let logger: RecordingLogger;
  let machine: PlaybackStateMachine;
  let sounds: FakeSoundHandle[];
  let group: Group;

  beforeEach(() => {
    logger = new RecordingLogger();
    machine = new PlaybackStateMachine(logger);
    sounds = [new FakeSoundHandle('a.wav'), new FakeSoundHandle('b.wav'), new FakeSoundHandle('c.wav')];
    group = createGroup(1, 'Birds', sounds);
  });

  describe('triggerSequential', () => {
    it('should walk the sequence, go idle after the last sound, then restart', () => {
      const indices: number[] = [];
      const results: TriggerResult[] = [];
      for (let i = 0; i < 5; i++) {
        results.push(machine.triggerSequential(group));
        indices.push(group.lastPlayedIndex);
      }

      expect(indices).toEqual([0, 1, 2, -1, 0]);
      expect(results).toEqual([
        { kind: 'played', index: 0 },
        { kind: 'played', index: 1 },
        { kind: 'played', index: 2 },
        { kind: 'completed' },
        { kind: 'played', index: 0 },
      ]);
    });

    it('should stop the previous sound before playing the next one', () => {
      machine.triggerSequential(group);
      machine.triggerSequential(group);

      expect(sounds[0].calls).toEqual(['seek', 'play', 'stop']);
      expect(sounds[1].calls).toEqual(['seek', 'play']);
      expect(sounds[0].isPlaying()).toBe(false);
      expect(sounds[1].isPlaying()).toBe(true);
    });

    it('should not start anything on the completing trigger', () => {
      for (let i = 0; i < 4; i++) machine.triggerSequential(group);

      expect(sounds[2].calls).toEqual(['seek', 'play', 'stop']);
      expect(sounds.some(s => s.isPlaying())).toBe(false);
      expect(logger.entries).toContainEqual({
        level: 'info',
        message: 'Sequence complete',
        meta: { group: 'Birds', sounds: 3 },
      });
    });

    it('should overlay sounds in stack mode', () => {
      const globals = createGlobalState({ stackFlag: true });

      machine.triggerSequential(group, globals);
      machine.triggerSequential(group, globals);

      expect(sounds[0].calls).toEqual(['seek', 'play']);
      expect(sounds[0].isPlaying()).toBe(true);
      expect(sounds[1].isPlaying()).toBe(true);
      expect(group.mode).toBe('parallel');
    });

    it('should leave stacked sounds playing when the sequence completes', () => {
      const globals = createGlobalState({ stackFlag: true });
      for (let i = 0; i < 4; i++) machine.triggerSequential(group, globals);

      expect(group.lastPlayedIndex).toBe(-1);
      expect(sounds.map(s => s.isPlaying())).toEqual([true, true, true]);
    });

    it('should restart a still playing sound with one stop and one play', () => {
      const globals = createGlobalState({ stackFlag: true });
      for (let i = 0; i < 5; i++) machine.triggerSequential(group, globals);

      expect(group.lastPlayedIndex).toBe(0);
      expect(sounds[0].calls).toEqual(['seek', 'play', 'stop', 'play']);
      expect(sounds[0].isPlaying()).toBe(true);
    });

    it('should snapshot the global flags only at trigger time', () => {
      const globals = createGlobalState();
      machine.triggerSequential(group, globals);

      toggleStack(globals);
      expect(group.stackEnabled).toBe(false);

      machine.triggerSequential(group, globals);
      expect(group.stackEnabled).toBe(true);
      expect(sounds[0].calls).toEqual(['seek', 'play']);
    });

    it('should keep the reserved random mode and play sequentially', () => {
      group.mode = 'random';

      machine.triggerSequential(group, createGlobalState({ stackFlag: true }));
      machine.triggerSequential(group, createGlobalState({ stackFlag: true }));

      expect(group.mode).toBe('random');
      expect(group.lastPlayedIndex).toBe(1);
    });

    it('should report an empty group without changing it', () => {
      const empty = createGroup(9, 'Empty');

      expect(machine.triggerSequential(empty)).toEqual({ kind: 'empty' });
      expect(empty.lastPlayedIndex).toBe(-1);
    });
  });

  describe('triggerSpecific', () => {
    it('should play the requested sound and continue the sequence from it', () => {
      expect(machine.triggerSpecific(group, 2)).toEqual({ kind: 'played', index: 2 });
      expect(sounds[2].isPlaying()).toBe(true);

      expect(machine.triggerSequential(group)).toEqual({ kind: 'completed' });
      expect(sounds[2].isPlaying()).toBe(false);
    });

    it('should stop the current sound unless stacking', () => {
      machine.triggerSequential(group);
      machine.triggerSpecific(group, 2);

      expect(sounds[0].isPlaying()).toBe(false);
      expect(sounds[2].isPlaying()).toBe(true);
      expect(group.lastPlayedIndex).toBe(2);
    });

    it('should reject indices outside the group', () => {
      expect(() => machine.triggerSpecific(group, 3)).toThrow(ValidationError);
      expect(() => machine.triggerSpecific(group, -1)).toThrow("Sound index -1 is out of range for group 'Birds'");
      expect(group.lastPlayedIndex).toBe(-1);
    });
  });

  describe('loopTick', () => {
    it('should restart a looping sound that reached its end', () => {
      machine.triggerSequential(group, createGlobalState({ loopFlag: true }));

      expect(machine.loopTick([group])).toBe(0);
      expect(sounds[0].calls).toEqual(['seek', 'play']);

      sounds[0].finish();
      expect(machine.loopTick([group])).toBe(1);
      expect(sounds[0].calls).toEqual(['seek', 'play', 'seek', 'play']);
      expect(sounds[0].isPlaying()).toBe(true);

      expect(machine.loopTick([group])).toBe(0);
    });

    it('should ignore groups without loop mode', () => {
      machine.triggerSequential(group);
      sounds[0].finish();

      expect(machine.loopTick([group])).toBe(0);
      expect(sounds[0].isPlaying()).toBe(false);
    });

    it('should only inspect the last played sound when not stacking', () => {
      const globals = createGlobalState({ loopFlag: true });
      machine.triggerSequential(group, globals);
      machine.triggerSequential(group, globals);
      sounds[0].finish();

      expect(machine.loopTick([group])).toBe(0);
    });

    it('should inspect every triggered sound when stacking', () => {
      const globals = createGlobalState({ loopFlag: true, stackFlag: true });
      machine.triggerSequential(group, globals);
      machine.triggerSequential(group, globals);
      sounds[0].finish();
      sounds[1].finish();
      sounds[2].finish();

      expect(machine.loopTick([group])).toBe(2);
      expect(sounds[2].calls).toEqual([]);
    });

    it('should skip idle groups', () => {
      group.loopEnabled = true;
      expect(machine.loopTick([group])).toBe(0);
    });
  });

  describe('stopAll', () => {
    it('should stop every sound and keep the sequence position', () => {
      machine.triggerSequential(group);
      machine.triggerSequential(group);

      machine.stopAll([group]);

      expect(sounds.map(s => s.isPlaying())).toEqual([false, false, false]);
      expect(sounds[2].calls).toEqual(['stop']);
      expect(group.lastPlayedIndex).toBe(1);

      expect(machine.triggerSequential(group)).toEqual({ kind: 'played', index: 2 });
    });
  });

  describe('handle failures', () => {
    it('should log a failing play and still advance', () => {
      sounds[1].failOn = 'play';
      machine.triggerSequential(group);

      expect(machine.triggerSequential(group)).toEqual({ kind: 'played', index: 1 });
      expect(group.lastPlayedIndex).toBe(1);
      expect(logger.entries).toContainEqual({
        level: 'error',
        message: 'Sound play failed',
        meta: { group: 'Birds', index: 1, path: 'b.wav', error: 'fake play failure' },
      });
    });

    it('should survive released handles during stop-all', () => {
      sounds[0].release();

      expect(() => machine.stopAll([group])).not.toThrow();
      expect(sounds[1].calls).toEqual(['stop']);
      expect(logger.messages('error')).toEqual(['Sound stop failed']);
    });
  });
});
