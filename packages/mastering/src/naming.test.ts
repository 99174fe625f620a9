import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import {
  ensureFlacExtension,
  isAudioFile,
  masteredFileName,
  masteredOutputPath,
  suggestBatchOutputDir,
  suggestSingleOutput,
} from './naming.js';

describe('naming', () => {
  it('derives the mastered file name from the input', () => {
    expect(masteredFileName('/music/track1.wav')).toBe('track1 (Mastered).flac');
    expect(masteredOutputPath('/music/track1.wav', '/out')).toBe(join('/out', 'track1 (Mastered).flac'));
  });

  it('recognises audio extensions regardless of case', () => {
    expect(['a.wav', 'b.FLAC', 'c.Aiff', 'd.mp3'].map(isAudioFile)).toEqual([true, true, true, true]);
    expect(isAudioFile('e.ogg')).toBe(false);
    expect(isAudioFile('wav')).toBe(false);
  });

  it('suggests a single output beside the target', () => {
    expect(suggestSingleOutput('/music/live/song.mp3')).toBe(join('/music/live', 'song (Mastered).flac'));
  });

  it('suggests a Mastered folder for batches', () => {
    expect(suggestBatchOutputDir({ directory: '/music/album' })).toBe(join('/music/album', 'Mastered'));
    expect(suggestBatchOutputDir({ files: ['/music/eps/one.wav', '/other/two.wav'] })).toBe(
      join('/music/eps', 'Mastered')
    );
    expect(suggestBatchOutputDir({ files: [] })).toBeNull();
  });

  it('appends .flac only when it is missing', () => {
    expect(ensureFlacExtension('/out/song')).toBe('/out/song.flac');
    expect(ensureFlacExtension('/out/song.FLAC')).toBe('/out/song.FLAC');
  });
});
