/**
 * Media Types
 */

export interface SubtitleTrack {
  index: number;
  codec: string;
  language: string; // 'und' when untagged
  title: string; // '' when untagged
}

export interface FourKOptions {
  highQuality4k: boolean;
  fourKHeightThreshold: number;
}

export interface FFProbeStream {
  index: number;
  codec_name?: string;
  codec_long_name?: string;
  codec_type?: 'video' | 'audio' | 'subtitle' | 'data' | 'attachment';
  width?: number;
  height?: number;
  channels?: number;
  sample_rate?: string;
  duration?: string;
  bit_rate?: string;
  tags?: Record<string, string>;
}

export interface FFProbeResult {
  format: {
    filename: string;
    nb_streams: number;
    format_name: string;
    format_long_name?: string;
    duration?: string;
    size?: string;
    bit_rate?: string;
    tags?: Record<string, string>;
  };
  streams: FFProbeStream[];
}
