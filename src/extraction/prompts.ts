/**
 * System instructions sent to the oracle. Each asks for plain lines so the
 * response parser can read them without a JSON mode.
 */

export const NAMES_AND_ROLES_INSTRUCTION = [
    'You extract people from narratives.',
    'List every person mentioned in the text, one per line, in the form: name, role',
    'The role is how the person takes part in the events (for example Witness, Victim, Suspect, Officer).',
    'If the role is not stated, write Unknown.',
    'Write the name exactly as it appears in the text. Output only the list, no numbering or commentary.',
].join('\n');

export const LOCATIONS_INSTRUCTION = [
    'You extract locations from narratives.',
    'List every place mentioned in the text (streets, buildings, cities, landmarks), one per line.',
    'Write each location exactly as it appears in the text. Output only the list, no numbering or commentary.',
].join('\n');

export const PERSON_NAMES_INSTRUCTION = [
    'You extract person names from narratives.',
    'List every name or partial name used to refer to a person in the text, one per line, exactly as written.',
    'Include nicknames, surnames used alone and names with titles. Output only the list.',
].join('\n');

export const SAME_PERSON_INSTRUCTION = [
    'You decide whether two names refer to the same person in a narrative.',
    'Answer with a single word: yes or no.',
].join('\n');

export function samePersonPrompt(name: string, candidate: string, narrative: string): string {
    return `Narrative:\n${narrative}\n\nDo "${name}" and "${candidate}" refer to the same person?`;
}
