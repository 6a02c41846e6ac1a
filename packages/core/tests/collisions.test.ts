import { describe, it, expect, beforeEach } from "vitest";
import {
  createCollisionRegistry,
  stageCollisionRegistry,
  type CollisionRegistry,
} from "../src/collisions.js";

describe("CollisionRegistry", () => {
  let registry: CollisionRegistry;

  beforeEach(() => {
    registry = createCollisionRegistry();
    registry.record({ hash: 1, literal: "jump", fileName: "a.c", offset: 10 });
  });

  it("should report a different literal with the same hash", () => {
    expect(registry.check(1, "run")).toEqual({
      hash: 1,
      literal: "jump",
      fileName: "a.c",
      offset: 10,
    });
  });

  it("should accept the same literal again", () => {
    expect(registry.check(1, "jump")).toBeUndefined();
    expect(registry.check(2, "run")).toBeUndefined();
  });

  it("should keep the first entry for a hash", () => {
    registry.record({ hash: 1, literal: "run", fileName: "b.c", offset: 0 });
    expect(registry.size).toBe(1);
    expect(registry.get(1)?.literal).toBe("jump");
  });

  it("should iterate and clear", () => {
    registry.record({ hash: 2, literal: "run", fileName: "b.c", offset: 0 });
    expect([...registry].map((e) => e.literal)).toEqual(["jump", "run"]);
    registry.clear();
    expect(registry.size).toBe(0);
  });
});

describe("stageCollisionRegistry", () => {
  it("should hold new entries back until commit", () => {
    const base = createCollisionRegistry();
    base.record({ hash: 1, literal: "jump", fileName: "a.c", offset: 0 });
    const staged = stageCollisionRegistry(base);

    staged.record({ hash: 2, literal: "run", fileName: "b.c", offset: 4 });

    expect(staged.check(1, "walk")?.literal).toBe("jump");
    expect(staged.check(2, "walk")?.literal).toBe("run");
    expect(staged.size).toBe(2);
    expect(base.size).toBe(1);

    staged.commit();

    expect(base.get(2)?.fileName).toBe("b.c");
    expect([...staged].map((e) => e.literal)).toEqual(["jump", "run"]);
  });

  it("should drop uncommitted entries on clear", () => {
    const base = createCollisionRegistry();
    const staged = stageCollisionRegistry(base);

    staged.record({ hash: 2, literal: "run", fileName: "b.c", offset: 4 });
    staged.clear();
    staged.commit();

    expect(base.size).toBe(0);
  });
});
