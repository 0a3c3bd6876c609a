import { describe, expect, it } from "vitest";
import { SKELETON_CONNECTIONS } from "../models/JointName";
import { jointSeverities, skeletonSegmentSeverities } from "./SkeletonSeverity";

describe("SkeletonSeverity", () => {
  const severities = { craniovertebralAngle: "moderate", trunkLean: "mild" } as const;

  it("should project metric severities onto joints", () => {
    const joints = jointSeverities(severities);
    expect(joints.neck_1_joint).toBe("moderate");
    expect(joints.spine_7_joint).toBe("mild");
    expect(joints.root).toBeUndefined();
  });

  it("should keep the worse severity on shared joints", () => {
    const joints = jointSeverities({ trunkLean: "mild", sagittalVerticalAxis: "severe" });
    expect(joints.spine_7_joint).toBe("severe");
    expect(joints.spine_6_joint).toBe("mild");
  });

  it("should grade each bone by its worse endpoint", () => {
    const segments = skeletonSegmentSeverities(severities);
    expect(segments).toHaveLength(SKELETON_CONNECTIONS.length);

    const find = (from: string, to: string) =>
      segments.find((s) => s.from === from && s.to === to)?.severity;
    expect(find("spine_7_joint", "neck_1_joint")).toBe("moderate");
    expect(find("spine_5_joint", "spine_6_joint")).toBe("mild");
    expect(find("root", "hips_joint")).toBe("normal");
  });
});
