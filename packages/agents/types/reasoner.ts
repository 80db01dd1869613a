// Reasoner: the opaque completion function desk stages delegate to
// Anything that turns instructions plus a prompt into text qualifies

export interface ReasonerRequest {
  /** Stage role, e.g. 'technical-analyst' */
  role: string;
  instructions: string;
  prompt: string;
  signal: AbortSignal;
}

export type Reasoner = (request: ReasonerRequest) => Promise<string>;
