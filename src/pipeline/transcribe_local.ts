import { openAsBlob } from "node:fs";
import path from "node:path";
import { fetch, FormData, type Dispatcher, type Response } from "undici";
import { z } from "zod";
import type { TranscriptionSettings } from "../config.js";
import { TranscriptionError, errorMessage } from "../errors.js";
import type { Transcript, TranscriptSegment } from "../types.js";

export interface Transcriber {
  transcribe(filePath: string): Promise<Transcript>;
}

// OpenAI-compatible verbose_json: text, language, duration and segments [{ id, start, end, text }]
const VerboseJsonSchema = z.object({
  text: z.string().optional(),
  language: z.string().optional(),
  duration: z.number().optional(),
  model: z.string().optional(),
  segments: z
    .array(
      z.object({
        start: z.number().optional(),
        end: z.number().optional(),
        text: z.string().optional(),
        speaker: z.string().optional(),
      })
    )
    .optional(),
});

export type VerboseJson = z.infer<typeof VerboseJsonSchema>;

const MIME_TYPES: Record<string, string> = {
  ".mp3": "audio/mpeg",
  ".wav": "audio/wav",
  ".m4a": "audio/mp4",
  ".aac": "audio/aac",
  ".ogg": "audio/ogg",
  ".flac": "audio/flac",
  ".mp4": "video/mp4",
  ".mov": "video/quicktime",
  ".webm": "video/webm",
  ".mkv": "video/x-matroska",
};

export function getMediaMimeType(fileName: string): string {
  const ext = path.extname(fileName).toLowerCase();
  return MIME_TYPES[ext] || "application/octet-stream";
}

/**
 * Client for a local speech-to-text service exposing the OpenAI
 * `/audio/transcriptions` route (e.g. a faster-whisper server).
 */
export class LocalAsrTranscriber implements Transcriber {
  constructor(
    private readonly settings: TranscriptionSettings,
    private readonly dispatcher?: Dispatcher
  ) {}

  async healthCheck(): Promise<boolean> {
    try {
      const res = await fetch(`${this.settings.localAsrBaseUrl}/healthz`, {
        dispatcher: this.dispatcher,
        signal: AbortSignal.timeout(10_000),
      });
      await res.body?.cancel();
      return res.ok;
    } catch {
      return false;
    }
  }

  async transcribe(filePath: string): Promise<Transcript> {
    const fileName = path.basename(filePath);
    const form = new FormData();
    const blob = await openAsBlob(filePath, { type: getMediaMimeType(fileName) });
    form.append("file", blob, fileName);
    form.append("model", this.settings.localAsrModel);
    form.append("task", "transcribe");
    if (this.settings.language) {
      form.append("language", this.settings.language);
    }
    form.append("response_format", "verbose_json");

    let res: Response;
    try {
      res = await fetch(`${this.settings.localAsrBaseUrl}/openai/v1/audio/transcriptions`, {
        method: "POST",
        body: form,
        dispatcher: this.dispatcher,
        signal: AbortSignal.timeout(this.settings.localTimeoutMs),
      });
    } catch (err) {
      throw new TranscriptionError(
        `Local ASR service is not available at ${this.settings.localAsrBaseUrl}: ${errorMessage(err)}`
      );
    }

    if (!res.ok) {
      const errorText = await res.text();
      throw new TranscriptionError(`Local ASR transcription failed: ${res.status} ${errorText}`, res.status);
    }

    const parsed = VerboseJsonSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new TranscriptionError("Local ASR service returned an unexpected response");
    }
    return normalizeVerboseJson(parsed.data, fileName, this.settings.localAsrModel);
  }
}

export function normalizeVerboseJson(raw: VerboseJson, file: string, model: string): Transcript {
  const segments: TranscriptSegment[] = (raw.segments ?? []).map((s, idx) => ({
    idx,
    startMs: Math.round((s.start ?? 0) * 1000),
    endMs: Math.round((s.end ?? 0) * 1000),
    speaker: s.speaker,
    text: (s.text ?? "").trim(),
  }));

  const text = raw.text ?? segments.map((s) => s.text).join(" ");

  return {
    file,
    language: raw.language,
    durationMs: raw.duration !== undefined ? Math.round(raw.duration * 1000) : undefined,
    model: raw.model ?? model,
    text: text.trim(),
    segments,
  };
}

function fmtClock(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${pad2(minutes)}:${pad2(seconds)}`;
}

function pad2(n: number) {
  return n.toString().padStart(2, "0");
}

/** Plain text, or one `[MM:SS - MM:SS] text` line per segment. */
export function formatTranscript(transcript: Transcript, withTimestamps: boolean): string {
  if (!withTimestamps || transcript.segments.length === 0) {
    return `${transcript.text}\n`;
  }
  const lines = transcript.segments.map((s) => {
    const speaker = s.speaker ? `${s.speaker}: ` : "";
    return `[${fmtClock(s.startMs)} - ${fmtClock(s.endMs)}] ${speaker}${s.text}`;
  });
  return `${lines.join("\n")}\n`;
}
