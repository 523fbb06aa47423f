import type { Annotation, StoredAnnotation } from '../models/escalation.js';

export interface ILearningStore {
  storeAnnotation(id: string, description: string, annotation: Annotation): Promise<boolean>;
  /** Most similar annotations first */
  searchAnnotations(query: string, limit?: number): Promise<StoredAnnotation[]>;
}
