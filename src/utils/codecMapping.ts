// Audio codec mappings (keys are upper-cased release tokens)
export const audioCodecMap: { [key: string]: string } = {
  // EAC3 / DDP (Dolby Digital Plus)
  'EAC3': 'eac3',
  'E-AC3': 'eac3',
  'E-AC-3': 'eac3',
  'DDP': 'eac3',
  'DD+': 'eac3',

  // AC3 / DD (Dolby Digital)
  'AC3': 'ac3',
  'AC-3': 'ac3',
  'DD': 'ac3',

  // Lossless
  'TRUEHD': 'truehd',
  'DTS-HD': 'dts-hd',
  'DTS-HD MA': 'dts-hd',
  'DTS-HDMA': 'dts-hd',
  'DTS-X': 'dts-x',
  'DTS': 'dts',
  'FLAC': 'flac',
  'PCM': 'pcm',
  'LPCM': 'pcm',

  // Lossy
  'AAC': 'aac',
  'MP3': 'mp3',
  'OPUS': 'opus',
};

// Video codec mappings
export const videoCodecMap: { [key: string]: string } = {
  'H.264': 'h264',
  'H264': 'h264',
  'AVC': 'h264',
  'X264': 'h264',

  'H.265': 'h265',
  'H265': 'h265',
  'HEVC': 'h265',
  'X265': 'h265',

  'VP9': 'vp9',
  'AV1': 'av1',
  'VC-1': 'vc1',
  'VC1': 'vc1',
  'MPEG-2': 'mpeg2',
  'MPEG2': 'mpeg2',

  'XVID': 'xvid',
  'DIVX': 'divx',
};

function mappingKey(token: string): string {
  return token.toUpperCase().trim().replace(/[\s._]+/g, ' ');
}

// Normalize audio codec name
export function normalizeAudioCodec(codec: string | undefined): string | undefined {
  if (!codec) return undefined;

  const key = mappingKey(codec);
  if (audioCodecMap[key]) {
    return audioCodecMap[key];
  }

  // Pattern matching
  if (key.includes('EAC3') || key.includes('DDP') || key.includes('DD+')) return 'eac3';
  if (key.includes('TRUEHD')) return 'truehd';
  if (key.startsWith('DTS-HD') || key.startsWith('DTS HD')) return 'dts-hd';
  if (key.startsWith('DTS')) return 'dts';
  if (key.includes('AC3') || key.includes('AC-3')) return 'ac3';
  if (key.includes('AAC')) return 'aac';

  return codec.toLowerCase(); // Lower-cased original if no match
}

// Normalize video codec name
export function normalizeVideoCodec(codec: string | undefined): string | undefined {
  if (!codec) return undefined;

  const key = mappingKey(codec).replace(/ /g, '.');
  if (videoCodecMap[key]) {
    return videoCodecMap[key];
  }

  // Pattern matching
  if (key.includes('264') || key.includes('AVC')) return 'h264';
  if (key.includes('265') || key.includes('HEVC')) return 'h265';
  if (key.includes('VP9')) return 'vp9';
  if (key.includes('AV1')) return 'av1';

  return codec.toLowerCase();
}
