export type CollaboratorStage = 'entity_extractor' | 'registry' | 'checker';

/** The document had no text to score. */
export class EmptyDocumentError extends Error {
  constructor(message = 'Document is empty') {
    super(message);
    this.name = 'EmptyDocumentError';
  }
}

/** An external collaborator failed; the run is aborted. */
export class CollaboratorError extends Error {
  readonly stage: CollaboratorStage;

  constructor(stage: CollaboratorStage, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${stage} failed: ${detail}`, { cause });
    this.name = 'CollaboratorError';
    this.stage = stage;
  }
}
