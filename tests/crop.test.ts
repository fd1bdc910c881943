import test from "node:test";
import assert from "node:assert/strict";
import {
  buildCropScaleFilter,
  computeCrop,
  dimensionsForVideo,
  evenFloor,
  isWithinAspectTolerance,
  resolveTargetDimensions,
} from "../src/media/crop.js";

test("evenFloor rounds down to an even integer", () => {
  assert.equal(evenFloor(607.5), 606);
  assert.equal(evenFloor(1081), 1080);
  assert.equal(evenFloor(1080), 1080);
});

test("computeCrop trims width when the input is wider than the target", () => {
  assert.deepEqual(computeCrop(1920, 1080, 1080, 1080), { cropWidth: 1080, cropHeight: 1080 });
});

test("computeCrop trims height when the input is taller than the target", () => {
  assert.deepEqual(computeCrop(1080, 1920, 16, 9), { cropWidth: 1080, cropHeight: 606 });
});

test("computeCrop output is even and never larger than the input", () => {
  const inputs: Array<[number, number]> = [
    [1920, 1080],
    [1001, 777],
    [641, 481],
    [720, 1280],
    [333, 333],
  ];
  const targets: Array<[number, number]> = [
    [16, 9],
    [1, 1],
    [9, 16],
    [4, 3],
  ];
  for (const [w, h] of inputs) {
    for (const [tw, th] of targets) {
      const crop = computeCrop(w, h, tw, th);
      assert.equal(crop.cropWidth % 2, 0, `${w}x${h} -> ${tw}:${th}`);
      assert.equal(crop.cropHeight % 2, 0, `${w}x${h} -> ${tw}:${th}`);
      assert.ok(crop.cropWidth <= w && crop.cropHeight <= h, `${w}x${h} -> ${tw}:${th}`);
    }
  }
});

test("aspect ratio tolerance is 0.01", () => {
  assert.equal(isWithinAspectTolerance(1920, 1080, 1.78), true);
  assert.equal(isWithinAspectTolerance(1280, 1024, 1.78), false);
});

test("resolveTargetDimensions derives the missing side from the aspect ratio", () => {
  assert.deepEqual(resolveTargetDimensions({ aspectRatio: 1.78, width: 1280 }), {
    kind: "fixed",
    width: 1280,
    height: 718,
  });
  assert.deepEqual(resolveTargetDimensions({ aspectRatio: 1.78, height: 720 }), {
    kind: "fixed",
    width: 1280,
    height: 720,
  });
  assert.deepEqual(resolveTargetDimensions({ aspectRatio: 1.5 }), { kind: "per-video", aspectRatio: 1.5 });
});

test("resolveTargetDimensions rejects width together with height", () => {
  assert.throws(
    () => resolveTargetDimensions({ aspectRatio: 1.78, width: 1280, height: 720 }),
    /either --width or --height/
  );
});

test("per-video dimensions keep the larger input side", () => {
  const target = resolveTargetDimensions({ aspectRatio: 1.78 });
  assert.deepEqual(dimensionsForVideo(target, { width: 1920, height: 1080 }), {
    width: 1920,
    height: 1078,
  });
  assert.deepEqual(dimensionsForVideo(target, { width: 1080, height: 1920 }), {
    width: 3416,
    height: 1920,
  });
});

test("crop/scale filter expression", () => {
  assert.equal(
    buildCropScaleFilter({ cropWidth: 1080, cropHeight: 1080 }, { width: 1280, height: 718 }),
    "crop=1080:1080,scale=1280:718"
  );
});
