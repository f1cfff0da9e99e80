import {
  YoutubeTranscript,
  YoutubeTranscriptDisabledError,
  YoutubeTranscriptNotAvailableError,
  YoutubeTranscriptNotAvailableLanguageError,
  YoutubeTranscriptTooManyRequestError,
  YoutubeTranscriptVideoUnavailableError,
} from 'youtube-transcript';
import { NotFoundError, TranscriptDisabledError, YouTubeApiError } from '../errors.js';
import type { TranscriptInfo } from '../types.js';

/** Captions come from the watch page, not the Data API, so no key is involved. */
export async function fetchTranscript(videoId: string, language: string): Promise<TranscriptInfo> {
  try {
    const lines = await YoutubeTranscript.fetchTranscript(videoId, { lang: language });
    return {
      videoId,
      language: lines[0]?.lang ?? language,
      segments: lines.map((line) => ({ start: line.offset, duration: line.duration, text: line.text })),
    };
  } catch (err) {
    if (err instanceof YoutubeTranscriptDisabledError) {
      throw new TranscriptDisabledError(`Transcripts are disabled for this video: ${videoId}`);
    }
    if (err instanceof YoutubeTranscriptNotAvailableLanguageError || err instanceof YoutubeTranscriptNotAvailableError) {
      throw new NotFoundError(`No transcript found for language '${language}' in video: ${videoId}`);
    }
    if (err instanceof YoutubeTranscriptVideoUnavailableError) {
      throw new NotFoundError(`Video is unavailable: ${videoId}`);
    }
    if (err instanceof YoutubeTranscriptTooManyRequestError) {
      throw new YouTubeApiError(`Transcript requests are rate limited: ${videoId}`, 429);
    }
    throw err;
  }
}
