/**
 * Tool listing and the per-tool panel (description, associated techniques
 * grouped by kill chain, correlated actors).
 */

import chalk from 'chalk';

import type { CorrelatedActor, Tool, ToolTechnique } from '../types/threat-intel.js';
import {
  renderSegments,
  segmentsLength,
  splitSegmentLines,
  wrapSegments,
  type Segment,
} from '../utils/text.js';

/** Entries per line in the tool listing. */
export const TOOLS_PER_LINE = 16;

const BRACKETED = /(\[.*?\]|\(.*?\))/;

// ---------------------------------------------------------------------------
// Tool listing
// ---------------------------------------------------------------------------

export function renderToolList(toolNames: string[]): string {
  const lines: string[] = [
    '',
    '',
    '',
    chalk.bold.yellow('Select a tool to see which actors are known to use it:'),
    '',
    '',
  ];

  for (let start = 0; start < toolNames.length; start += TOOLS_PER_LINE) {
    const entries = toolNames
      .slice(start, start + TOOLS_PER_LINE)
      .map((name, i) => `${chalk.bold.yellow(String(start + i + 1))}. ${chalk.bold.cyan(name)}`);
    if (start > 0) lines.push('');
    lines.push(entries.join('   '));
  }

  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// Tool panel
// ---------------------------------------------------------------------------

/**
 * Indent each line by four spaces and highlight "[...]" and "(...)"
 * segments in magenta; other text is bold green.
 */
export function formatToolDescription(text: string): Segment[] {
  const segments: Segment[] = [];
  for (const line of text.split('\n')) {
    segments.push({ text: '    ' });
    for (const part of line.split(BRACKETED)) {
      if (part.length === 0) continue;
      const bracketed =
        (part.startsWith('[') && part.endsWith(']')) || (part.startsWith('(') && part.endsWith(')'));
      segments.push({ text: part, style: bracketed ? chalk.magenta : chalk.bold.green });
    }
    segments.push({ text: '\n' });
  }
  return segments;
}

export function buildToolPanelContent(
  tool: Tool,
  techniques: ToolTechnique[],
  actors: CorrelatedActor[],
): Segment[] {
  const segments: Segment[] = [{ text: '\n' }, ...formatToolDescription(tool.description)];

  segments.push({ text: '\nAssociated Techniques:\n', style: chalk.bold.yellow });
  if (techniques.length > 0) {
    let currentKillChain: string | undefined;
    for (const technique of techniques) {
      if (technique.killChain !== currentKillChain) {
        currentKillChain = technique.killChain;
        segments.push({ text: `\n${currentKillChain}\n`, style: chalk.bold.yellow });
      }
      segments.push(
        { text: '\n* Kill Chain: ', style: chalk.green },
        { text: `${technique.killChain}\n`, style: chalk.cyan },
        { text: '    Name: ', style: chalk.green },
        { text: `${technique.name}\n`, style: chalk.cyan },
        { text: '    Platform: ', style: chalk.green },
        { text: `${technique.platform}\n`, style: chalk.cyan },
        { text: '    Description: ', style: chalk.green },
        { text: `${technique.description}\n`, style: chalk.cyan },
      );
    }
  } else {
    segments.push({ text: 'No techniques found for this tool.\n', style: chalk.bold.red });
  }

  segments.push({ text: '\nCorrelated Actors:\n', style: chalk.bold.yellow });
  if (actors.length > 0) {
    for (const actor of actors) {
      segments.push(
        { text: `\n* ${actor.name}:`, style: chalk.yellow },
        { text: ` ${actor.description}\n`, style: chalk.bold.cyan },
      );
    }
  } else {
    segments.push({ text: 'No correlated actors found for this tool.\n', style: chalk.bold.red });
  }

  return segments;
}

/**
 * Draw `segments` inside a rounded box of `width` columns with `title`
 * centred in the top border.
 */
export function renderPanel(title: string, segments: Segment[], width: number): string {
  const boxWidth = Math.max(10, width);
  const inner = boxWidth - 4;
  const border = chalk.dim;

  const label = ` ${title} `;
  const space = boxWidth - 2 - Array.from(label).length;
  const top = space >= 0
    ? border(`╭${'─'.repeat(Math.floor(space / 2))}`) +
      chalk.bold(label) +
      border(`${'─'.repeat(space - Math.floor(space / 2))}╮`)
    : border(`╭${'─'.repeat(boxWidth - 2)}╮`);

  const lines: string[] = [top];

  for (const line of splitSegmentLines(segments)) {
    for (const wrapped of wrapSegments(line, inner)) {
      const fill = ' '.repeat(Math.max(0, inner - segmentsLength(wrapped)));
      lines.push(`${border('│')} ${renderSegments(wrapped)}${fill} ${border('│')}`);
    }
  }

  lines.push(border(`╰${'─'.repeat(boxWidth - 2)}╯`));
  return lines.join('\n');
}

export function renderToolPanel(
  tool: Tool,
  techniques: ToolTechnique[],
  actors: CorrelatedActor[],
  width: number,
): string {
  return renderPanel(tool.name, buildToolPanelContent(tool, techniques, actors), width);
}
