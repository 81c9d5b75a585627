import { createLogger, type Logger } from '../lib/logger.js';
import type { EntityRecognizer, EntityType, RecognizedEntity, ResolvedValue } from './types.js';

export const ENTITY_CONFIDENCE = 80;

const LABELS_BY_ENTITY_TYPE: Record<EntityType, readonly string[]> = {
  DATE: ['DATE', 'TIME'],
  MONEY: ['MONEY'],
  PERSON: ['PERSON'],
  ORG: ['ORG'],
  LOCATION: ['GPE', 'LOC'],
  GPE: ['GPE', 'LOC'],
};

export function labelsForEntityType(entityType: EntityType): readonly string[] {
  return LABELS_BY_ENTITY_TYPE[entityType];
}

/**
 * Wraps a recognizer backend so that callers never see its failures. A backend
 * error is logged and reads as "nothing recognised".
 */
export class EntityRecognizerAdapter {
  constructor(
    private readonly backend: EntityRecognizer,
    private readonly logger: Logger = createLogger('entity-recognizer')
  ) {}

  get backendName(): string {
    return this.backend.name;
  }

  findEntities(text: string): RecognizedEntity[] {
    try {
      return this.backend.findEntities(text);
    } catch (err) {
      this.logger.warn({ err, backend: this.backend.name }, 'Entity recognizer failed; treating as no entities');
      return [];
    }
  }

  findKeyTerms(text: string): string[] {
    if (!this.backend.findKeyTerms) return [];
    try {
      return this.backend.findKeyTerms(text);
    } catch (err) {
      this.logger.warn({ err, backend: this.backend.name }, 'Key term lookup failed');
      return [];
    }
  }

  findFirst(text: string, entityType: EntityType): ResolvedValue | null {
    const labels = labelsForEntityType(entityType);
    const entity = this.findEntities(text).find((candidate) => labels.includes(candidate.label));
    if (!entity || !entity.text.trim()) return null;
    return { value: entity.text.trim(), confidence: ENTITY_CONFIDENCE };
  }
}

/**
 * Availability is settled here, once. Without a backend the engine runs with no
 * adapter and its entity steps are skipped for the life of the engine.
 */
export function createEntityRecognizerAdapter(
  backend: EntityRecognizer | null | undefined,
  logger: Logger = createLogger('entity-recognizer')
): EntityRecognizerAdapter | null {
  if (!backend) {
    logger.info('No entity recognizer configured; entity fallback disabled');
    return null;
  }
  logger.debug({ backend: backend.name }, 'Entity recognizer ready');
  return new EntityRecognizerAdapter(backend, logger);
}
