import { FurnaceModule, getNumChannels, Subsong } from '../model/module.js';

function subsongLine(song: Subsong, index: number): string {
  const { timing } = song;
  const orders = song.order[0]?.length ?? 0;
  const label = song.name ? ` "${song.name}"` : '';
  return `  ${index}${label}: speed ${timing.speed[0]}/${timing.speed[1]}, timebase ${timing.timebase}, `
    + `${timing.clockSpeed} Hz, pattern length ${song.patternLength}, ${orders} orders`;
}

/**
 * Multi-line, human readable overview of a decoded module.
 */
export function getModuleSummary(module: FurnaceModule): string {
  const lines: string[] = [];
  lines.push(`Name: ${module.meta.name || '(untitled)'}`);
  lines.push(`Author: ${module.meta.author || '(unknown)'}`);
  lines.push(`Format version: ${module.meta.version}`);
  lines.push(`Chips (${module.chips.list.length}):`);
  for (const chip of module.chips.list) {
    lines.push(`  ${chip.type.name}: ${chip.type.channels} channels`);
  }
  lines.push(`Channels: ${getNumChannels(module)}`);
  lines.push(`Subsongs (${module.subsongs.length}):`);
  module.subsongs.forEach((song, i) => lines.push(subsongLine(song, i)));
  lines.push(`Instruments: ${module.instruments.length}`);
  lines.push(`Wavetables: ${module.wavetables.length}`);
  lines.push(`Samples: ${module.samples.length}`);
  lines.push(`Patterns: ${module.patterns.length}`);
  return lines.join('\n');
}
