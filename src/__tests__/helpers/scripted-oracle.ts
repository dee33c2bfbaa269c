import type { Oracle } from '../../llm/oracle.js';

export interface OracleCall {
    prompt: string;
    systemInstruction?: string;
}

type Responder = (call: OracleCall) => string;

/**
 * Oracle double that answers from a script and records every call.
 * A responder function sees each call; a string array is consumed in order
 * (and answers '' once exhausted).
 */
export class ScriptedOracle implements Oracle {
    readonly calls: OracleCall[] = [];
    private readonly responder: Responder;

    constructor(script: Responder | string[]) {
        if (typeof script === 'function') {
            this.responder = script;
        } else {
            const queue = [...script];
            this.responder = () => queue.shift() ?? '';
        }
    }

    async generate(prompt: string, systemInstruction?: string): Promise<string> {
        const call = { prompt, systemInstruction };
        this.calls.push(call);
        return this.responder(call);
    }
}
