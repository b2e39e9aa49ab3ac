// Entity extraction: ordered fallback stages
import type { Entity, ExtractResponse } from "../../../../shared/types";
import type { Generator } from "../generation";
import { withSpan } from "../../config/otel";
import { errorMessage } from "../../utils/errors";

export interface ExtractionStage {
  name: string;
  /** null (or an empty list) hands the text to the next stage. */
  run(text: string): Promise<Entity[] | null>;
}

const MIN_NAME_LENGTH = 2;
const LLM_INPUT_LIMIT = 1000;

// A run of capitalised words on one line, e.g. "Ada Lovelace" or "NASA".
const CAPITALISED_RUN = /\p{Lu}[\p{L}\p{N}-]*(?:[ \t]+\p{Lu}[\p{L}\p{N}-]*)*/gu;

function isAcronym(word: string) {
  return word.length >= MIN_NAME_LENGTH && /^[\p{Lu}\p{N}]+$/u.test(word);
}

function atSentenceStart(text: string, index: number) {
  const before = text.slice(0, index).trimEnd();
  return before === "" || /[.!?:]$/.test(before);
}

function pushUnique(out: Entity[], seen: Set<string>, entity: Entity) {
  if (entity.name.length < MIN_NAME_LENGTH || seen.has(entity.name)) return;
  seen.add(entity.name);
  out.push(entity);
}

/**
 * Capitalised-phrase matcher. A capital that only marks the start of a
 * sentence does not count, so "Yesterday Ada Lovelace" yields "Ada Lovelace".
 */
export const heuristicStage: ExtractionStage = {
  name: "heuristic",
  async run(text) {
    const out: Entity[] = [];
    const seen = new Set<string>();

    for (const match of text.matchAll(CAPITALISED_RUN)) {
      let words = match[0].trim().split(/[ \t]+/);
      if (atSentenceStart(text, match.index ?? 0) && !isAcronym(words[0])) {
        words = words.slice(1);
      }
      if (words.length === 0) continue;

      const name = words.join(" ");
      if (words.length === 1 && isAcronym(name)) {
        pushUnique(out, seen, { name, type: "ACRONYM" });
      } else if (words.length > 1) {
        pushUnique(out, seen, { name, type: "NAMED_ENTITY" });
      } else {
        pushUnique(out, seen, { name, type: "CONCEPT" });
      }
    }

    return out.length > 0 ? out : null;
  }
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function toEntity(v: unknown): Entity | null {
  if (!isRecord(v)) return null;
  const { name, type, description } = v;
  if (typeof name !== "string" || !name.trim()) return null;
  return {
    name: name.trim(),
    type: typeof type === "string" && type.trim() ? type.trim().toUpperCase() : "CONCEPT",
    ...(typeof description === "string" && description ? { description } : {})
  };
}

/**
 * Accepts a bare JSON array of entities or an object with an `entities` array,
 * optionally wrapped in a ```json fence or surrounded by prose.
 */
export function parseEntityJson(response: string): Entity[] | null {
  const cleaned = response.trim().replace(/^```(?:json)?\n?/, "").replace(/\n?```$/, "");
  const candidates = [cleaned, cleaned.match(/\[[\s\S]*\]/)?.[0], cleaned.match(/\{[\s\S]*\}/)?.[0]];

  for (const candidate of candidates) {
    if (!candidate) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(candidate);
    } catch {
      continue;
    }
    const list = Array.isArray(parsed) ? parsed : isRecord(parsed) ? parsed.entities : undefined;
    if (!Array.isArray(list)) continue;

    const out: Entity[] = [];
    const seen = new Set<string>();
    for (const item of list) {
      const entity = toEntity(item);
      if (entity) pushUnique(out, seen, entity);
    }
    return out;
  }
  return null;
}

export function buildExtractionPrompt(text: string) {
  return [
    "Extract the people, organizations, locations and key concepts mentioned in the text.",
    'Respond only with JSON: {"entities": [{"name": "...", "type": "PERSON|ORGANIZATION|LOCATION|CONCEPT", "description": "..."}]}',
    "",
    "Text:",
    text.slice(0, LLM_INPUT_LIMIT)
  ].join("\n");
}

export function createLlmStage(generator: Generator): ExtractionStage {
  return {
    name: "llm",
    async run(text) {
      const response = await generator.generate(buildExtractionPrompt(text));
      const entities = parseEntityJson(response);
      if (entities === null) {
        console.warn("[Extraction] llm stage returned no parsable JSON");
      }
      return entities;
    }
  };
}

export class ExtractionChain {
  constructor(private stages: ExtractionStage[]) { }

  get stageNames() {
    return this.stages.map((s) => s.name);
  }

  async extract(text: string): Promise<ExtractResponse> {
    return await withSpan(
      "extraction.extract",
      async () => {
        for (const stage of this.stages) {
          try {
            const entities = await stage.run(text);
            if (entities && entities.length > 0) {
              console.log(`[Extraction] ${stage.name} stage found ${entities.length} entities`);
              return { stage: stage.name, entities };
            }
          } catch (error) {
            console.warn(`[Extraction] ${stage.name} stage failed: ${errorMessage(error)}`);
          }
        }
        return { stage: null, entities: [] };
      },
      { textLength: text.length, stages: this.stages.length }
    );
  }
}
