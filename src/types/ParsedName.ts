export type ContentType = 'movie' | 'series' | 'anime' | 'unknown';
export type Resolution = '360p' | '480p' | '576p' | '720p' | '1080p' | '2160p';
export type HdrFormat = 'none' | 'hdr10' | 'hdr10+' | 'dolby_vision';

/**
 * Structured view of a release name. Every optional field is absent when the
 * name carried no recognizable token for it.
 */
export interface ParsedName {
  rawTitle: string;
  contentType: ContentType;
  year?: number;
  season?: number;
  episode?: number;
  /** Season pack: a season marker without an episode number */
  fullSeason: boolean;
  resolution?: Resolution;
  videoCodec?: string;
  audioCodec?: string;
  audioChannels?: string;
  hdr?: HdrFormat;
  source?: string;
  platform?: string;
  edition?: string;
  releaseGroup?: string;
  languages: string[];
  subtitles: string[];
  multiLanguage: boolean;
}
