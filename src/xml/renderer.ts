/**
 * XML renderer
 *
 * Serializes a parsed program as
 *
 *   <program language="IPPcode24">
 *     <instruction order="1" opcode="MOVE">
 *       <arg1 type="var">GF@x</arg1>
 *       ...
 *
 * indented with tabs.
 */

import type { Element, ElementContent } from 'xast';
import { toXml } from 'xast-util-to-xml';
import type { Operand } from '../parser/operand.js';
import type { Instruction } from '../parser/parser.js';
import type { Program } from '../parser/program.js';

const INDENT = '\t';

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

function element(name: string, attributes: Record<string, string>, children: ElementContent[] = []): Element {
  return { type: 'element', name, attributes, children };
}

/** Puts each child on its own line, one level deeper than `depth`. */
function indented(children: Element[], depth: number): ElementContent[] {
  if (children.length === 0) {
    return [];
  }

  const content: ElementContent[] = [];
  for (const child of children) {
    content.push({ type: 'text', value: '\n' + INDENT.repeat(depth + 1) }, child);
  }
  content.push({ type: 'text', value: '\n' + INDENT.repeat(depth) });
  return content;
}

export function renderOperand(operand: Operand, position: number): Element {
  return element(`arg${position}`, { type: operand.kind }, [{ type: 'text', value: operand.text }]);
}

export function renderInstruction(instruction: Instruction): Element {
  const args = instruction.operands.map((operand, index) => renderOperand(operand, index + 1));

  return element(
    'instruction',
    { order: String(instruction.order), opcode: instruction.opcode },
    indented(args, 1)
  );
}

export function renderProgram(program: Program): string {
  const instructions = program.instructions.map(renderInstruction);

  const root = element('program', { language: program.language }, indented(instructions, 0));

  return `${XML_DECLARATION}\n${toXml(root, { closeEmptyElements: true, tightClose: true })}\n`;
}
