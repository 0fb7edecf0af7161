/**
 * Timeline Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Timeline } from './Timeline';
import { Tween } from './Tween';
import { TweenEvent } from './callbacks';
import {
  DanglingOpenGroupError,
  InfiniteRepeatInCompositeError,
  InvalidChildError,
  StructuralMutationAfterBuildError,
  UnclosedNestedTreeError,
} from './errors';
import { setEngineConfig } from '@/config/engineConfig';
import { Point, PointAttr, pointAccessor } from '@/test/mocks';

describe('Timeline', () => {
  let point: Point;

  beforeEach(() => {
    Tween.registerAccessor(Point, pointAccessor);
    point = new Point();
  });

  function linear(type: number, duration: number, value: number): Tween {
    return Tween.to(point, type, duration).target(value).ease('linear');
  }

  // ===========================================================================
  // Build
  // ===========================================================================

  describe('build', () => {
    it('should chain children of a sequence', () => {
      const a = Tween.to(point, PointAttr.X, 500);
      const b = Tween.to(point, PointAttr.Y, 300);

      const timeline = Timeline.createSequence().push(a).push(b).build();

      expect(timeline.getDuration()).toBe(800);
      expect(a.getDelay()).toBe(0);
      expect(b.getDelay()).toBe(500);
    });

    it('should add the offset to a child delay of its own', () => {
      const a = Tween.to(point, PointAttr.X, 500);
      const b = Tween.to(point, PointAttr.Y, 300).delay(100);

      const timeline = Timeline.createSequence().push(a).push(b).build();

      expect(timeline.getDuration()).toBe(900);
      expect(b.getDelay()).toBe(600);
    });

    it('should use full durations, repeats included', () => {
      const a = Tween.to(point, PointAttr.X, 100).repeat(2, 50);
      const b = Tween.to(point, PointAttr.Y, 100);

      const timeline = Timeline.createSequence().push(a).push(b).build();

      expect(timeline.getDuration()).toBe(500);
      expect(b.getDelay()).toBe(400);
    });

    it('should keep the longest child of a parallel group', () => {
      const a = Tween.to(point, PointAttr.X, 500);
      const b = Tween.to(point, PointAttr.Y, 300);

      const timeline = Timeline.createParallel().push(a).push(b).build();

      expect(timeline.getDuration()).toBe(500);
      expect(a.getDelay()).toBe(0);
      expect(b.getDelay()).toBe(0);
    });

    it('should make the next child overlap after a negative pause', () => {
      const a = Tween.to(point, PointAttr.X, 500);
      const b = Tween.to(point, PointAttr.Y, 300);

      const timeline = Timeline.createSequence().push(a).pushPause(-200).push(b).build();

      expect(b.getDelay()).toBe(300);
      expect(timeline.getDuration()).toBe(600);
    });

    it('should delay the next child after a positive pause', () => {
      const b = Tween.to(point, PointAttr.Y, 300);

      const timeline = Timeline.createSequence().pushPause(250).push(b).build();

      expect(b.getDelay()).toBe(250);
      expect(timeline.getDuration()).toBe(550);
    });

    it('should build nested groups', () => {
      const a = Tween.to(point, PointAttr.X, 100);
      const b = Tween.to(point, PointAttr.Y, 200);
      const c = Tween.to(point, PointAttr.X, 50);
      const d = Tween.to(point, PointAttr.Y, 100);

      const timeline = Timeline.createSequence().push(a).beginParallel().push(b).push(c).end().push(d).build();

      const [, group] = timeline.getChildren();
      expect(group).toBeInstanceOf(Timeline);
      expect(group.getDelay()).toBe(100);
      expect(group.getDuration()).toBe(200);
      expect(b.getDelay()).toBe(0);
      expect(c.getDelay()).toBe(0);
      expect(d.getDelay()).toBe(300);
      expect(timeline.getDuration()).toBe(400);
      expect(timeline.getChildrenCount()).toBe(5);
    });

    it('should accept a closed timeline as a child', () => {
      const inner = Timeline.createSequence()
        .push(Tween.to(point, PointAttr.X, 100))
        .push(Tween.to(point, PointAttr.Y, 100));
      const after = Tween.to(point, PointAttr.X, 50);

      const timeline = Timeline.createSequence().push(inner).push(after).build();

      expect(inner.getDuration()).toBe(200);
      expect(after.getDelay()).toBe(200);
      expect(timeline.getDuration()).toBe(250);
    });

    it('should be idempotent', () => {
      const a = Tween.to(point, PointAttr.X, 500);
      const b = Tween.to(point, PointAttr.Y, 300);
      const timeline = Timeline.createSequence().push(a).push(b);

      timeline.build();
      timeline.build();

      expect(timeline.getDuration()).toBe(800);
      expect(b.getDelay()).toBe(500);
    });

    it('should have a zero duration when empty', () => {
      expect(Timeline.createSequence().build().getDuration()).toBe(0);
      expect(Timeline.createParallel().build().getDuration()).toBe(0);
    });

    it('should reject infinite repeats anywhere in the tree without touching it', () => {
      const a = Tween.to(point, PointAttr.X, 500);
      const b = Tween.to(point, PointAttr.Y, 300);
      const timeline = Timeline.createSequence()
        .push(a)
        .push(b)
        .beginParallel()
        .push(Tween.to(point, PointAttr.X, 100).repeat(-1))
        .end();

      expect(() => timeline.build()).toThrow(InfiniteRepeatInCompositeError);
      expect(b.getDelay()).toBe(0);
      expect(timeline.isBuilt()).toBe(false);
      expect(timeline.getDuration()).toBe(0);
    });

    it('should reject a build with open groups', () => {
      const timeline = Timeline.createSequence().beginParallel();

      expect(() => timeline.build()).toThrow(UnclosedNestedTreeError);
    });
  });

  // ===========================================================================
  // Builder
  // ===========================================================================

  describe('builder', () => {
    it('should throw when end() has no open group', () => {
      const timeline = Timeline.createSequence();

      expect(() => timeline.end()).toThrow(DanglingOpenGroupError);
      expect(() => timeline.end()).toThrow(StructuralMutationAfterBuildError);
    });

    it('should close groups innermost first', () => {
      const a = Tween.to(point, PointAttr.X, 100);
      const timeline = Timeline.createSequence().beginParallel().beginSequence().push(a);

      expect(timeline.getChildren()).toEqual([a]);
      timeline.end();
      expect(timeline.getChildren()).toHaveLength(1);
      expect(timeline.getChildren()[0]).toBeInstanceOf(Timeline);
      timeline.end();
      expect(() => timeline.end()).toThrow(DanglingOpenGroupError);
    });

    it('should expose the children of the open group', () => {
      const a = Tween.to(point, PointAttr.X, 100);
      const b = Tween.to(point, PointAttr.Y, 100);
      const timeline = Timeline.createSequence().push(a).beginParallel().push(b);

      expect(timeline.getChildren()).toEqual([b]);

      timeline.end();
      expect(timeline.getChildren()).toHaveLength(2);
      expect(timeline.getChildren()[0]).toBe(a);
    });

    it('should freeze the children once built', () => {
      const timeline = Timeline.createSequence().push(Tween.mark()).build();

      expect(Object.isFrozen(timeline.getChildren())).toBe(true);
    });

    it('should reject structural changes after build', () => {
      const timeline = Timeline.createSequence().push(Tween.mark()).build();

      expect(() => timeline.push(Tween.mark())).toThrow(StructuralMutationAfterBuildError);
      expect(() => timeline.pushPause(10)).toThrow(StructuralMutationAfterBuildError);
      expect(() => timeline.beginSequence()).toThrow(StructuralMutationAfterBuildError);
      expect(() => timeline.beginParallel()).toThrow(StructuralMutationAfterBuildError);
      expect(() => timeline.end()).toThrow('Cannot call end() once the unit is built or started');
      expect(timeline.getChildren()).toHaveLength(1);
    });

    it('should reject a timeline pushed with open groups', () => {
      const other = Timeline.createSequence().beginSequence();

      expect(() => Timeline.createSequence().push(other)).toThrow(UnclosedNestedTreeError);
    });

    it('should reject invalid children', () => {
      const timeline = Timeline.createSequence();
      const tween = Tween.to(point, PointAttr.X, 100);
      timeline.push(tween);

      expect(() => timeline.push(timeline)).toThrow(InvalidChildError);
      expect(() => timeline.push(tween)).toThrow('The unit already belongs to a timeline');
      expect(() => Timeline.createParallel().push(tween)).toThrow(InvalidChildError);
      expect(() => timeline.push(Tween.mark().start())).toThrow('A started unit cannot be added to a timeline');
      expect(timeline.getChildren()).toHaveLength(1);
    });

    it('should report its mode', () => {
      expect(Timeline.createSequence().getMode()).toBe('sequence');
      expect(Timeline.createParallel().getMode()).toBe('parallel');
    });
  });

  // ===========================================================================
  // Update
  // ===========================================================================

  describe('update', () => {
    function sequenceXY(): Timeline {
      return Timeline.createSequence().push(linear(PointAttr.X, 100, 100)).push(linear(PointAttr.Y, 100, 50));
    }

    it('should play sequence children one after the other', () => {
      const timeline = sequenceXY().start();

      timeline.update(50);
      expect(point).toMatchObject({ x: 50, y: 0 });

      timeline.update(100);
      expect(point).toMatchObject({ x: 100, y: 25 });

      timeline.update(60);
      expect(point).toMatchObject({ x: 100, y: 50 });
      expect(timeline.isFinished()).toBe(true);
    });

    it('should play parallel children together', () => {
      const timeline = Timeline.createParallel()
        .push(linear(PointAttr.X, 100, 100))
        .push(linear(PointAttr.Y, 200, 100))
        .start();

      timeline.update(50);
      expect(point).toMatchObject({ x: 50, y: 25 });
    });

    it('should return every target to its start when rewound to zero', () => {
      const timeline = sequenceXY().start();

      timeline.update(50);
      timeline.update(100);
      timeline.update(60);
      timeline.update(-210);

      expect(point).toMatchObject({ x: 0, y: 0 });
      expect(timeline.getPosition()).toBe(0);
    });

    it('should rewind part of the way symmetrically', () => {
      const timeline = sequenceXY().start();

      timeline.update(50);
      timeline.update(100);
      timeline.update(-100);

      expect(point).toMatchObject({ x: 50, y: 0 });
    });

    it('should keep child positions equal to the time inside the timeline', () => {
      const a = linear(PointAttr.X, 100, 100);
      const timeline = Timeline.createSequence().delay(30).push(a).start();

      timeline.update(80);
      expect(timeline.getCurrentTime()).toBe(50);
      expect(a.getPosition()).toBe(50);
    });

    it('should fire a callback placed at the very end', () => {
      const callback = vi.fn();
      const timeline = Timeline.createSequence().pushPause(100).push(Tween.call(callback)).start();

      timeline.update(50);
      expect(callback).not.toHaveBeenCalled();

      timeline.update(50);
      expect(callback).toHaveBeenCalledTimes(1);
      expect(callback).toHaveBeenCalledWith(TweenEvent.START, expect.any(Tween));
    });

    it('should apply a set placed between tweens', () => {
      const timeline = Timeline.createSequence()
        .push(linear(PointAttr.X, 100, 100))
        .push(Tween.set(point, PointAttr.Y).target(7))
        .start();

      timeline.update(99);
      expect(point.y).toBe(0);

      timeline.update(1);
      expect(point.y).toBe(7);
    });

    it('should ignore updates while paused', () => {
      const timeline = sequenceXY().start();

      timeline.pause();
      timeline.update(50);

      expect(point.x).toBe(0);
    });
  });

  // ===========================================================================
  // Repeat & Yoyo
  // ===========================================================================

  describe('repeat', () => {
    it('should restart the children on the next iteration', () => {
      const timeline = Timeline.createSequence().push(linear(PointAttr.X, 100, 100)).repeat(1).start();

      timeline.update(80);
      expect(point.x).toBe(80);

      timeline.update(70);
      expect(timeline.getIteration()).toBe(1);
      expect(point.x).toBe(50);
    });

    it('should play the children backward on yoyo iterations', () => {
      const timeline = Timeline.createSequence().push(linear(PointAttr.X, 100, 100)).repeatYoyo(1).start();

      timeline.update(80);
      expect(point.x).toBe(80);

      timeline.update(70);
      expect(point.x).toBe(50);

      timeline.update(50);
      expect(point.x).toBe(0);
      expect(timeline.isFinished()).toBe(true);
    });

    it('should rewind through iterations back to the start', () => {
      const timeline = Timeline.createSequence().push(linear(PointAttr.X, 100, 100)).repeatYoyo(1).start();

      timeline.update(80);
      timeline.update(70);
      timeline.update(50);
      timeline.update(-120);
      expect(point.x).toBe(80);

      timeline.update(-80);
      expect(point.x).toBe(0);
    });

    it('should jump over a whole iteration in one update', () => {
      const timeline = Timeline.createSequence()
        .push(linear(PointAttr.X, 100, 100))
        .repeat(2)
        .start();

      timeline.update(250);

      expect(timeline.getIteration()).toBe(2);
      expect(point.x).toBe(50);
    });

    it('should reflect a nested yoyo group inside a repeating parent', () => {
      const inner = Timeline.createSequence().push(linear(PointAttr.X, 100, 100)).repeatYoyo(1);
      const outer = Timeline.createSequence().push(inner).repeat(1).start();

      // parent iteration 0, child iteration 0
      outer.update(30);
      expect(point.x).toBe(30);

      // parent iteration 0, child iteration 1 (backward)
      outer.update(100);
      expect(inner.getIteration()).toBe(1);
      expect(point.x).toBe(70);

      // parent iteration 1, child iteration 0
      outer.update(100);
      expect(outer.getIteration()).toBe(1);
      expect(inner.getIteration()).toBe(0);
      expect(point.x).toBe(30);

      // parent iteration 1, child iteration 1 (backward)
      outer.update(140);
      expect(inner.getIteration()).toBe(1);
      expect(point.x).toBe(30);

      outer.update(30);
      expect(point.x).toBe(0);
      expect(outer.isFinished()).toBe(true);
    });

    it('should return a nested repeating tree to its start when rewound', () => {
      const timeline = Timeline.createSequence()
        .push(linear(PointAttr.X, 100, 100))
        .pushPause(-50)
        .beginParallel()
        .push(linear(PointAttr.Y, 100, 80).repeat(1, 20))
        .end()
        .push(Timeline.createSequence().push(linear(PointAttr.X, 50, 20)).repeatYoyo(1, 10))
        .repeat(1, 40)
        .start();

      expect(timeline.getFullDuration()).toBe(800);

      timeline.update(130);
      expect(point).toMatchObject({ x: 100, y: 64 });

      timeline.update(250);
      timeline.update(270);
      timeline.update(150);
      expect(timeline.isFinished()).toBe(true);

      timeline.update(-800);

      expect(point).toMatchObject({ x: 0, y: 0 });
      expect(timeline.getPosition()).toBe(0);
    });
  });

  // ===========================================================================
  // Events
  // ===========================================================================

  describe('events', () => {
    it('should emit its own events at its boundaries', () => {
      const onComplete = vi.fn();
      const timeline = sequenceTimeline().addCallback(TweenEvent.COMPLETE, onComplete).start();

      timeline.update(150);
      expect(onComplete).not.toHaveBeenCalled();

      timeline.update(50);
      expect(onComplete).toHaveBeenCalledTimes(1);
      expect(onComplete).toHaveBeenCalledWith(TweenEvent.COMPLETE, timeline);
    });

    function sequenceTimeline(): Timeline {
      return Timeline.createSequence().push(linear(PointAttr.X, 100, 10)).push(linear(PointAttr.Y, 100, 10));
    }
  });

  // ===========================================================================
  // Targets & Lifecycle
  // ===========================================================================

  describe('target queries', () => {
    it('should count descendants through open groups', () => {
      const timeline = Timeline.createSequence()
        .push(linear(PointAttr.X, 100, 1))
        .beginParallel()
        .push(linear(PointAttr.Y, 100, 2));
      const counts = { tweens: 0, timelines: 0 };

      timeline.countDescendants(counts);

      expect(timeline.getChildren()).toHaveLength(1);
      expect(counts).toEqual({ tweens: 2, timelines: 1 });
    });

    it('should find targets anywhere in the tree', () => {
      const other = new Point();
      const timeline = Timeline.createSequence()
        .push(Tween.to(point, PointAttr.X, 100))
        .beginParallel()
        .push(Tween.to(other, PointAttr.Y, 100))
        .end();

      expect(timeline.containsTarget(point)).toBe(true);
      expect(timeline.containsTarget(other, PointAttr.Y)).toBe(true);
      expect(timeline.containsTarget(other, PointAttr.X)).toBe(false);
      expect(timeline.containsTarget(new Point())).toBe(false);
    });

    it('should kill the whole timeline or nothing', () => {
      const child = Tween.to(point, PointAttr.X, 100);
      const timeline = Timeline.createSequence().push(child);

      timeline.killTarget(new Point());
      expect(timeline.isKilled()).toBe(false);

      timeline.killTarget(point);
      expect(timeline.isKilled()).toBe(true);
      expect(child.isKilled()).toBe(false);
    });
  });

  describe('free', () => {
    it('should free children most recent first and return to the pool', () => {
      const a = Tween.mark();
      const b = Tween.mark();
      const order: Tween[] = [];
      const freeA = vi.spyOn(a, 'free').mockImplementation(() => order.push(a));
      const freeB = vi.spyOn(b, 'free').mockImplementation(() => order.push(b));
      const timeline = Timeline.createSequence().push(a).push(b);
      const idle = Timeline.getPoolSize();

      timeline.free();

      expect(order).toEqual([b, a]);
      expect(freeA).toHaveBeenCalledTimes(1);
      expect(freeB).toHaveBeenCalledTimes(1);
      expect(Timeline.getPoolSize()).toBe(idle + 1);
      expect(timeline.getChildren()).toHaveLength(0);
    });

    it('should recycle nested groups and their tweens', () => {
      const timeline = Timeline.createSequence()
        .push(Tween.mark())
        .beginParallel()
        .push(Tween.mark())
        .end();
      const idleTimelines = Timeline.getPoolSize();
      const idleTweens = Tween.getPoolSize();

      timeline.free();

      expect(Timeline.getPoolSize()).toBe(idleTimelines + 2);
      expect(Tween.getPoolSize()).toBe(idleTweens + 2);
    });

    it('should not pool timelines created while pooling is disabled', () => {
      setEngineConfig({ poolingEnabled: false });
      const timeline = Timeline.createSequence();
      const idle = Timeline.getPoolSize();

      timeline.free();

      expect(timeline.isPooled()).toBe(false);
      expect(Timeline.getPoolSize()).toBe(idle);
    });

    it('should pre-allocate idle timelines', () => {
      const target = Timeline.getPoolSize() + 3;
      Timeline.ensurePoolCapacity(target);

      expect(Timeline.getPoolSize()).toBe(target);
    });
  });
});
