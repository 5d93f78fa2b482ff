/**
 * Capability descriptor normalization.
 *
 * Raw Agent Card JSON → frozen CapabilityDescriptor, and back to the wire
 * shape for serving this node's own card.
 */

import type { CapabilityDescriptor, Skill } from "./types.js";
import { normalizeAgentUrl, type RawAgentCard } from "./validation.js";

/** Order-preserving de-duplication */
function uniqueStrings(values: readonly string[] | null | undefined): readonly string[] {
  if (!values) return Object.freeze([]);
  return Object.freeze([...new Set(values)]);
}

function normalizeSkills(raw: RawAgentCard["skills"]): readonly Skill[] {
  if (!raw) return Object.freeze([]);
  const seen = new Set<string>();
  const skills: Skill[] = [];
  for (const s of raw) {
    const id = s.id ?? s.name ?? "";
    if (id === "" || seen.has(id)) continue;
    seen.add(id);
    skills.push(
      Object.freeze({
        id,
        name: s.name ?? id,
        description: s.description ?? "",
        tags: uniqueStrings(s.tags),
        examples: Object.freeze([...(s.examples ?? [])]),
      }),
    );
  }
  return Object.freeze(skills);
}

/**
 * Build a descriptor from a validated Agent Card.
 * The advertised `url` wins over the source URL when it is a valid http(s) URL.
 */
export function toCapabilityDescriptor(card: RawAgentCard, sourceUrl: string): CapabilityDescriptor {
  const advertised = normalizeAgentUrl(card.url);
  return Object.freeze({
    name: card.name,
    description: card.description ?? card.desciption ?? "",
    baseUrl: advertised !== "" ? advertised : sourceUrl,
    sourceUrl,
    version: card.version ?? "0.0.0",
    supportedInputModes: uniqueStrings(card.defaultInputModes),
    supportedOutputModes: uniqueStrings(card.defaultOutputModes),
    capabilities: Object.freeze({
      streaming: card.capabilities?.streaming === true,
      pushNotifications: card.capabilities?.pushNotifications === true,
    }),
    skills: normalizeSkills(card.skills),
  });
}

/**
 * Wire shape of a descriptor, as served on the well-known endpoint.
 */
export function toAgentCard(descriptor: CapabilityDescriptor): Record<string, unknown> {
  return {
    name: descriptor.name,
    description: descriptor.description,
    url: `${descriptor.baseUrl}/`,
    version: descriptor.version,
    defaultInputModes: [...descriptor.supportedInputModes],
    defaultOutputModes: [...descriptor.supportedOutputModes],
    capabilities: { ...descriptor.capabilities },
    skills: descriptor.skills.map((s) => ({
      id: s.id,
      name: s.name,
      description: s.description,
      tags: [...s.tags],
      examples: [...s.examples],
    })),
  };
}
