import assert from "node:assert/strict";
import test from "node:test";
import {
  cleanText,
  isAfterCutoff,
  parseDateTimeToTimestamp,
  parseDateToTimestamp,
  parseUkrainianDate
} from "./text";

const localSeconds = (...parts: [number, number, number, number?, number?, number?]): number => {
  const [year, month, day, hours = 0, minutes = 0, seconds = 0] = parts;
  return Math.floor(new Date(year, month, day, hours, minutes, seconds).getTime() / 1000);
};

test("cleanText strips tags and unescapes entities", () => {
  assert.equal(cleanText("  <p>Fast &amp; <b>quiet</b></p>\n"), "Fast & quiet");
  assert.equal(cleanText("&quot;ok&quot; &lt;3"), "\"ok\" <3");
  assert.equal(cleanText(null), "");
  assert.equal(cleanText(undefined), "");
});

test("parseDateToTimestamp reads YYYY-MM-DD as local midnight", () => {
  assert.equal(parseDateToTimestamp("2024-03-12"), localSeconds(2024, 2, 12));
  assert.equal(parseDateToTimestamp("2024-02-30"), null);
  assert.equal(parseDateToTimestamp("12.03.2024"), null);
  assert.equal(parseDateToTimestamp(undefined), null);
});

test("parseDateTimeToTimestamp reads review timestamps", () => {
  assert.equal(parseDateTimeToTimestamp("2023-11-05 14:30:15"), localSeconds(2023, 10, 5, 14, 30, 15));
  assert.equal(parseDateTimeToTimestamp("2023-11-05T14:30:15Z"), null);
  assert.equal(parseDateTimeToTimestamp("2023-11-05 25:00:00"), null);
});

test("parseUkrainianDate maps genitive month names", () => {
  assert.equal(parseUkrainianDate("12 березня 2024"), localSeconds(2024, 2, 12));
  assert.equal(parseUkrainianDate(" 1 Грудня 2022 "), localSeconds(2022, 11, 1));
  assert.equal(parseUkrainianDate("12 march 2024"), null);
  assert.equal(parseUkrainianDate("березня 2024"), null);
});

test("isAfterCutoff keeps records created exactly at the cutoff", () => {
  const cutoff = localSeconds(2024, 0, 10);
  assert.equal(isAfterCutoff(cutoff, cutoff), false);
  assert.equal(isAfterCutoff(cutoff + 1, cutoff), true);
  assert.equal(isAfterCutoff(cutoff + 1, null), false);
});
