import assert from "node:assert/strict";
import test from "node:test";
import { containsSpeech, parsePcmWav, peakRmsLevel } from "../audio/wav.js";
import { buildWav, silentWav, spokenWav } from "./helpers/audio.js";

test("parsePcmWav reads the format header and data chunk", () => {
  const wav = parsePcmWav(buildWav([1, -1, 2], 8000));

  assert.equal(wav.sampleRateHz, 8000);
  assert.equal(wav.channels, 1);
  assert.equal(wav.bitsPerSample, 16);
  assert.equal(wav.data.length, 6);
  assert.equal(wav.data.readInt16LE(2), -1);
});

test("parsePcmWav tolerates a data size left unset by a streaming recorder", () => {
  const buf = buildWav([100, 200]);
  buf.writeUInt32LE(0xffffffff, 40);

  const wav = parsePcmWav(buf);
  assert.equal(wav.data.length, 4);
});

test("parsePcmWav rejects non-WAV input", () => {
  assert.throws(() => parsePcmWav(Buffer.from("ID3 not a wav file")), /not a RIFF\/WAVE file/);
});

test("parsePcmWav rejects 8-bit audio", () => {
  const buf = buildWav([0, 0]);
  buf.writeUInt16LE(8, 34);
  assert.throws(() => parsePcmWav(buf), /unsupported sample width 8/);
});

test("peakRmsLevel is zero for silence and half scale for a half-scale square wave", () => {
  assert.equal(peakRmsLevel(parsePcmWav(silentWav())), 0);
  assert.equal(peakRmsLevel(parsePcmWav(spokenWav())), 0.5);
});

test("peakRmsLevel picks the loudest window", () => {
  const samples = [...new Array<number>(960).fill(0), ...new Array<number>(480).fill(8192)];
  assert.equal(peakRmsLevel(parsePcmWav(buildWav(samples))), 0.25);
});

test("containsSpeech compares the peak level with the threshold", () => {
  const wav = parsePcmWav(spokenWav());
  assert.equal(containsSpeech(wav, 0.5), true);
  assert.equal(containsSpeech(wav, 0.6), false);
  assert.equal(containsSpeech(parsePcmWav(buildWav([])), 0.01), false);
});
