export interface PcmWav {
  readonly sampleRateHz: number;
  readonly channels: number;
  readonly bitsPerSample: number;
  readonly data: Buffer;
}

const WAVE_FORMAT_PCM = 1;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

export function parsePcmWav(buf: Buffer): PcmWav {
  if (buf.length < 12 || buf.toString("ascii", 0, 4) !== "RIFF" || buf.toString("ascii", 8, 12) !== "WAVE") {
    throw new Error("not a RIFF/WAVE file");
  }

  let format: Omit<PcmWav, "data"> | undefined;
  let data: Buffer | undefined;
  let offset = 12;
  while (offset + 8 <= buf.length) {
    const id = buf.toString("ascii", offset, offset + 4);
    const declared = buf.readUInt32LE(offset + 4);
    const start = offset + 8;
    // Recorders writing to a pipe leave the size unset; take what is there.
    const size = Math.min(declared, buf.length - start);

    if (id === "fmt ") {
      if (size < 16) throw new Error("truncated fmt chunk");
      const audioFormat = buf.readUInt16LE(start);
      if (audioFormat !== WAVE_FORMAT_PCM && audioFormat !== WAVE_FORMAT_EXTENSIBLE) {
        throw new Error(`unsupported WAV encoding ${audioFormat}`);
      }
      format = {
        channels: buf.readUInt16LE(start + 2),
        sampleRateHz: buf.readUInt32LE(start + 4),
        bitsPerSample: buf.readUInt16LE(start + 14),
      };
    } else if (id === "data") {
      data = buf.subarray(start, start + size);
    }

    offset = start + size + (size % 2);
  }

  if (!format) throw new Error("missing fmt chunk");
  if (!data) throw new Error("missing data chunk");
  if (format.bitsPerSample !== 16) {
    throw new Error(`unsupported sample width ${format.bitsPerSample}`);
  }
  if (format.channels < 1 || format.sampleRateHz <= 0) {
    throw new Error("invalid WAV format header");
  }
  return { ...format, data };
}

/** Loudest windowed RMS level in the recording, as a fraction of full scale. */
export function peakRmsLevel(wav: PcmWav, windowMs = 30): number {
  const totalSamples = Math.floor(wav.data.length / 2);
  if (totalSamples === 0) return 0;

  const framesPerWindow = Math.max(1, Math.round((wav.sampleRateHz * windowMs) / 1000));
  const samplesPerWindow = framesPerWindow * wav.channels;

  let peak = 0;
  for (let first = 0; first < totalSamples; first += samplesPerWindow) {
    const last = Math.min(first + samplesPerWindow, totalSamples);
    let sumSquares = 0;
    for (let i = first; i < last; i += 1) {
      const sample = wav.data.readInt16LE(i * 2) / 32768;
      sumSquares += sample * sample;
    }
    peak = Math.max(peak, Math.sqrt(sumSquares / (last - first)));
  }
  return peak;
}

export function containsSpeech(wav: PcmWav, threshold: number): boolean {
  return peakRmsLevel(wav) >= threshold;
}
