import { randomUUID } from 'crypto';
import { Offering } from '../types';
import { OfferingInput, OfferingPatch } from '../schemas/request';
import {
  CatalogNotFoundError,
  DuplicateOfferingError,
  OfferingNotFoundError,
} from '../utils/errors';
import { createOffering } from '../utils/validation';
import { logger } from '../utils/logger';

function offeringKey(name: string, sectionId: string): string {
  return JSON.stringify([name, sectionId]);
}

/**
 * Editable list of offerings, keyed by (name, sectionId), kept in insertion order
 */
export class OfferingCatalog {
  private readonly offerings = new Map<string, Offering>();

  constructor(readonly id: string, initial: OfferingInput[] = []) {
    for (const input of initial) {
      this.addOffering(input);
    }
  }

  get size(): number {
    return this.offerings.size;
  }

  addOffering(input: OfferingInput): Offering {
    const offering = createOffering(input);
    const key = offeringKey(offering.name, offering.sectionId);
    if (this.offerings.has(key)) {
      throw new DuplicateOfferingError(offering.name, offering.sectionId);
    }
    this.offerings.set(key, offering);
    return offering;
  }

  getOffering(name: string, sectionId: string): Offering {
    const offering = this.offerings.get(offeringKey(name, sectionId));
    if (!offering) {
      throw new OfferingNotFoundError(name, sectionId);
    }
    return offering;
  }

  /**
   * Apply a partial patch; the merged record is validated again as a whole
   */
  updateOffering(name: string, sectionId: string, patch: OfferingPatch): Offering {
    const existing = this.getOffering(name, sectionId);
    const updated = createOffering({ ...existing, ...patch, name, sectionId });
    // Map.set on an existing key keeps its position
    this.offerings.set(offeringKey(name, sectionId), updated);
    return updated;
  }

  removeOffering(name: string, sectionId: string): Offering {
    const existing = this.getOffering(name, sectionId);
    this.offerings.delete(offeringKey(name, sectionId));
    return existing;
  }

  listOfferings(): Offering[] {
    return Array.from(this.offerings.values());
  }
}

class CatalogService {
  private catalogs = new Map<string, OfferingCatalog>();

  createCatalog(initial: OfferingInput[] = []): OfferingCatalog {
    const catalog = new OfferingCatalog(randomUUID(), initial);
    this.catalogs.set(catalog.id, catalog);
    logger.info('Catalog created', { catalogId: catalog.id, offerings: catalog.size });
    return catalog;
  }

  getCatalog(catalogId: string): OfferingCatalog {
    const catalog = this.catalogs.get(catalogId);
    if (!catalog) {
      throw new CatalogNotFoundError(catalogId);
    }
    return catalog;
  }

  deleteCatalog(catalogId: string): void {
    if (!this.catalogs.delete(catalogId)) {
      throw new CatalogNotFoundError(catalogId);
    }
    logger.info('Catalog deleted', { catalogId });
  }

  listCatalogIds(): string[] {
    return Array.from(this.catalogs.keys());
  }

  /**
   * Drop every catalog (useful for testing)
   */
  clear(): void {
    this.catalogs = new Map();
  }
}

export { CatalogService };
export default new CatalogService();
