import catalogService, { OfferingCatalog } from '../catalogService';
import {
  CatalogNotFoundError,
  DuplicateOfferingError,
  InvalidParameterError,
  OfferingNotFoundError,
} from '../../utils/errors';

describe('OfferingCatalog', () => {
  let catalog: OfferingCatalog;

  beforeEach(() => {
    catalog = new OfferingCatalog('test', [
      { name: 'Math', category: 'REQUIRED', sectionId: 'A', credits: 3, timeSlots: ['Mon/1,2'] },
      { name: 'Math', category: 'REQUIRED', sectionId: 'B', credits: 3, timeSlots: ['Tue/1,2'] },
    ]);
  });

  it('should list offerings in insertion order', () => {
    expect(catalog.listOfferings().map((o) => o.sectionId)).toEqual(['A', 'B']);
    expect(catalog.size).toBe(2);
  });

  it('should add a validated offering with defaults', () => {
    const added = catalog.addOffering({ name: 'Art', category: 'ELECTIVE', sectionId: 'A', credits: 2 });

    expect(added.priority).toBe(3);
    expect(catalog.listOfferings().map((o) => o.name)).toEqual(['Math', 'Math', 'Art']);
  });

  it('should reject a duplicate name and section', () => {
    expect(() =>
      catalog.addOffering({ name: 'Math', category: 'ELECTIVE', sectionId: 'A', credits: 1 })
    ).toThrow(DuplicateOfferingError);
  });

  it('should update in place and keep position', () => {
    const updated = catalog.updateOffering('Math', 'A', { priority: 5, excluded: true, timeSlots: ['Wed/3'] });

    expect(updated.priority).toBe(5);
    expect(updated.excluded).toBe(true);
    expect(updated.timeSlots).toEqual([{ day: 'WED', period: 3 }]);
    expect(updated.credits).toBe(3);
    expect(catalog.listOfferings()[0]).toBe(updated);
  });

  it('should validate the merged record on update', () => {
    expect(() => catalog.updateOffering('Math', 'A', { credits: -2 })).toThrow(InvalidParameterError);
    expect(catalog.getOffering('Math', 'A').credits).toBe(3);
  });

  it('should remove an offering', () => {
    const removed = catalog.removeOffering('Math', 'B');

    expect(removed.sectionId).toBe('B');
    expect(catalog.listOfferings().map((o) => o.sectionId)).toEqual(['A']);
  });

  it('should report missing offerings', () => {
    expect(() => catalog.updateOffering('Math', 'Z', { priority: 1 })).toThrow(OfferingNotFoundError);
    expect(() => catalog.removeOffering('Physics', 'A')).toThrow(OfferingNotFoundError);
  });
});

describe('CatalogService', () => {
  afterEach(() => catalogService.clear());

  it('should create, look up and delete catalogs', () => {
    const catalog = catalogService.createCatalog([
      { name: 'Math', category: 'REQUIRED', sectionId: 'A', credits: 3 },
    ]);

    expect(catalogService.listCatalogIds()).toEqual([catalog.id]);
    expect(catalogService.getCatalog(catalog.id)).toBe(catalog);

    catalogService.deleteCatalog(catalog.id);
    expect(() => catalogService.getCatalog(catalog.id)).toThrow(CatalogNotFoundError);
  });

  it('should report unknown catalogs on delete', () => {
    expect(() => catalogService.deleteCatalog('missing')).toThrow(CatalogNotFoundError);
  });
});
