/**
 * Parser for the Thought / Action / Final Answer reply format.
 *
 *   Thought: I need housing and food figures
 *   Action: compare_spending("housing", "food")
 *
 * Labels may be bold, headed or differently cased. Action arguments may be a JSON
 * object, positional values, key=value pairs, or a separate `Action Input:` block.
 * Everything from the first `Observation:` label on is ignored: the model does not
 * get to write its own observations.
 */

import type { ToolCall } from "../types";

export type ParsedReply =
  | { kind: "action"; thought?: string; call: ToolCall }
  | { kind: "final"; thought?: string; answer: string }
  | { kind: "invalid"; thought?: string; reason: string };

export interface ParseOptions {
  /** Parameter names of a tool in declaration order; undefined for unknown tools. */
  parameterOrder?: (toolName: string) => string[] | undefined;
}

type Label = "thought" | "action" | "action_input" | "final" | "observation";

interface Section {
  label: Label;
  text: string;
}

const LABEL_LINE = /^[\s#>*_-]*(thought|action[\s_]+input|action|final[\s_]+answer|observation)[\s*_]*:[\s*_]*(.*)$/i;
const FENCE_LINE = /^\s*```/;

export function parseModelReply(text: string, options: ParseOptions = {}): ParsedReply {
  const sections = splitSections(text);
  const thought = sections.find((s) => s.label === "thought")?.text || undefined;

  const decisive = sections.find((s) => s.label === "action" || s.label === "final");
  if (!decisive) {
    return { kind: "invalid", thought, reason: "Reply contains neither an Action nor a Final Answer" };
  }

  if (decisive.label === "final") {
    if (decisive.text === "") {
      return { kind: "invalid", thought, reason: "Final Answer is empty" };
    }
    return { kind: "final", thought, answer: decisive.text };
  }

  const input = sections.find((s) => s.label === "action_input");
  const parsed = parseAction(decisive.text, input?.text, options);
  if ("reason" in parsed) return { kind: "invalid", thought, reason: parsed.reason };
  return { kind: "action", thought, call: parsed.call };
}

function splitSections(text: string): Section[] {
  const sections: Section[] = [];
  let current: Section | undefined;

  for (const line of text.split(/\r?\n/)) {
    if (FENCE_LINE.test(line)) continue;

    const m = line.match(LABEL_LINE);
    if (m) {
      const label = toLabel(m[1]);
      if (label === "observation") break;
      current = { label, text: stripEmphasis(m[2]) };
      sections.push(current);
    } else if (current) {
      current.text = current.text === "" ? line.trim() : `${current.text}\n${line.trimEnd()}`;
    }
  }

  return sections.map((s) => ({ label: s.label, text: s.text.trim() }));
}

function toLabel(raw: string): Label {
  const key = raw.toLowerCase().replace(/[\s_]+/g, " ");
  if (key === "thought") return "thought";
  if (key === "action input") return "action_input";
  if (key === "action") return "action";
  if (key === "final answer") return "final";
  return "observation";
}

function stripEmphasis(text: string): string {
  return text.replace(/^[*_]+/, "").replace(/[*_]+$/, "").trim();
}

type ActionParse = { call: ToolCall } | { reason: string };

function parseAction(actionText: string, inputText: string | undefined, options: ParseOptions): ActionParse {
  const m = actionText.match(/^`*([A-Za-z_][\w.]*)`*[ \t]*/);
  if (!m) {
    return { reason: "Action is missing a tool name" };
  }
  const toolName = m[1];
  const inner = argumentText(actionText, m[0].length)?.trim() ?? "";

  if (inner === "") {
    if (inputText === undefined || inputText === "") return { call: { toolName, arguments: {} } };
    const fromInput = parseJsonObject(inputText);
    return "reason" in fromInput ? fromInput : { call: { toolName, arguments: fromInput.args } };
  }

  if (inner.startsWith("{")) {
    const json = parseJsonObject(inner);
    return "reason" in json ? json : { call: { toolName, arguments: json.args } };
  }

  const parts = splitArguments(inner);
  if (parts.length > 0 && parts.every((p) => /^\w+\s*=/.test(p))) {
    const args: Record<string, unknown> = {};
    for (const part of parts) {
      const eq = part.indexOf("=");
      args[part.slice(0, eq).trim()] = unquote(part.slice(eq + 1).trim());
    }
    return { call: { toolName, arguments: args } };
  }

  const order = options.parameterOrder?.(toolName);
  if (!order) {
    return { reason: `Positional arguments given for unknown tool "${toolName}"` };
  }
  const args: Record<string, unknown> = {};
  parts.forEach((part, i) => {
    args[order[i] ?? `arg${i}`] = unquote(part);
  });
  return { call: { toolName, arguments: args } };
}

/**
 * Text between the `(` at `start` and its matching `)`, skipping quoted strings
 * and nested brackets. Anything after the closing paren is ignored.
 */
function argumentText(text: string, start: number): string | undefined {
  if (text[start] !== "(") return undefined;
  const closers: string[] = [];
  let quote: string | undefined;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === "\\") i++;
      else if (ch === quote) quote = undefined;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === "(" || ch === "[" || ch === "{") {
      closers.push(ch === "(" ? ")" : ch === "[" ? "]" : "}");
    } else if (ch === closers[closers.length - 1]) {
      closers.pop();
      if (closers.length === 0) return text.slice(start + 1, i);
    }
  }
  return undefined;
}

function parseJsonObject(text: string): { args: Record<string, unknown> } | { reason: string } {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return { reason: `Action arguments are not valid JSON: ${text}` };
  }
  if (!isPlainObject(value)) {
    return { reason: "Action arguments must be a JSON object" };
  }
  return { args: { ...value } };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Split on top-level commas, keeping quoted strings intact.
 */
export function splitArguments(text: string): string[] {
  const parts: string[] = [];
  let current = "";
  let quote: string | undefined;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      current += ch;
      if (ch === "\\" && i + 1 < text.length) {
        current += text[++i];
      } else if (ch === quote) {
        quote = undefined;
      }
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      current += ch;
    } else if (ch === ",") {
      parts.push(current.trim());
      current = "";
    } else {
      current += ch;
    }
  }
  if (current.trim() !== "" || parts.length > 0) parts.push(current.trim());
  return parts.filter((p) => p !== "");
}

function unquote(value: string): string {
  const first = value[0];
  if ((first === '"' || first === "'") && value.length >= 2 && value.endsWith(first)) {
    return value.slice(1, -1).replace(/\\(.)/g, "$1");
  }
  return value;
}
