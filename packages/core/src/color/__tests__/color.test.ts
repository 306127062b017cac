import { assert, describe, test } from "@beam/testkit";
import { hueByDistance, hueToRgb, radialField, wheelColor } from "../hue.js";
import { WHITE, formatHexColor, paletteAt, parseHexColor, rgb, scaleRgb } from "../rgb.js";

describe("color/rgb", () => {
  test("parseHexColor accepts long and short forms with optional hash", () => {
    assert.deepEqual(parseHexColor("#ff0000"), { r: 255, g: 0, b: 0 });
    assert.deepEqual(parseHexColor("00ff00"), { r: 0, g: 255, b: 0 });
    assert.deepEqual(parseHexColor("#0f8"), { r: 0, g: 255, b: 136 });
  });

  test("parseHexColor rejects malformed and non-string input", () => {
    assert.equal(parseHexColor("notacolor"), null);
    assert.equal(parseHexColor("#12345"), null);
    assert.equal(parseHexColor(""), null);
    assert.equal(parseHexColor(123), null);
    assert.equal(parseHexColor(null), null);
  });

  test("formatHexColor pads channels", () => {
    assert.equal(formatHexColor({ r: 1, g: 171, b: 255 }), "#01abff");
  });

  test("rgb clamps channels to integer bytes", () => {
    assert.deepEqual(rgb(-4, 300, 12.6), { r: 0, g: 255, b: 13 });
  });

  test("scaleRgb multiplies by level / 256", () => {
    assert.deepEqual(scaleRgb(WHITE, 255), { r: 254, g: 254, b: 254 });
    assert.deepEqual(scaleRgb({ r: 200, g: 100, b: 0 }, 128), { r: 100, g: 50, b: 0 });
    assert.deepEqual(scaleRgb(WHITE, 0), { r: 0, g: 0, b: 0 });
  });

  test("paletteAt wraps in both directions", () => {
    const red = rgb(255, 0, 0);
    const green = rgb(0, 255, 0);
    const palette = [red, green] as const;
    assert.equal(paletteAt(palette, 0), red);
    assert.equal(paletteAt(palette, 3), green);
    assert.equal(paletteAt(palette, -1), green);
  });
});

describe("color/hue", () => {
  test("wheelColor hits the primaries at segment starts", () => {
    assert.deepEqual(wheelColor(0), { r: 255, g: 0, b: 0 });
    assert.deepEqual(wheelColor(128), { r: 0, g: 255, b: 0 });
    assert.deepEqual(wheelColor(256), { r: 0, g: 0, b: 255 });
    assert.deepEqual(wheelColor(64), { r: 127, g: 128, b: 0 });
  });

  test("wheelColor wraps around the wheel", () => {
    assert.deepEqual(wheelColor(384), wheelColor(0));
    assert.deepEqual(wheelColor(-1), { r: 254, g: 0, b: 1 });
    assert.deepEqual(wheelColor(1000), wheelColor(1000 - 384 * 2));
  });

  test("hueToRgb walks the hue circle", () => {
    assert.deepEqual(hueToRgb(0), { r: 255, g: 0, b: 0 });
    assert.deepEqual(hueToRgb(43), { r: 255, g: 255, b: 0 });
    assert.deepEqual(hueToRgb(86), { r: 0, g: 255, b: 0 });
    assert.deepEqual(hueToRgb(256), hueToRgb(0));
  });

  test("hueByDistance shifts the distance hue by the offset", () => {
    assert.deepEqual(hueByDistance(0, 2, 0), { r: 255, g: 0, b: 0 });
    assert.deepEqual(hueByDistance(1, 2, 0), { r: 0, g: 255, b: 246 });
    assert.deepEqual(hueByDistance(0, 2, 300), { r: 243, g: 255, b: 0 });
  });

  test("radialField measures integer distance from the centre", () => {
    assert.deepEqual(radialField(3, 1), [[1, 0, 1]]);
    assert.deepEqual(radialField(4, 2), [
      [1, 0, 0, 1],
      [1, 0, 0, 1],
    ]);
  });
});
