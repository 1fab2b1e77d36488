import { describe, it, expect, beforeEach } from 'vitest';
import { CatalogCache } from '../../../catalog/catalog-cache.js';
import { CatalogSource } from '../../../catalog/catalog-source.js';
import type { GeographyLevel, Product } from '../../../core/types/index.js';
import { FakeTransport } from '../../utils/fake-transport.js';
import { CATALOG_URL, catalogDocuments } from '../../fixtures/catalog-documents.js';

const SOURCE_CONFIG = { catalogUrl: CATALOG_URL, apiHostPattern: 'api.census.gov/data' };

describe('CatalogCache', () => {
  let transport: FakeTransport;
  let cache: CatalogCache;

  beforeEach(() => {
    transport = new FakeTransport(catalogDocuments());
    const source = new CatalogSource(transport, SOURCE_CONFIG, () => null);
    cache = new CatalogCache(() => source.fetchProducts());
  });

  describe('getProducts', () => {
    it('shares one load between concurrent callers', async () => {
      transport.hold();
      const first = cache.getProducts();
      const second = cache.getProducts();
      transport.release();

      const [a, b] = await Promise.all([first, second]);

      expect(transport.callsTo(CATALOG_URL)).toBe(1);
      expect(a).toBe(b);
      expect(a.success).toBe(true);
    });

    it('reports load warnings once and serves later calls from memory', async () => {
      const loaded = await cache.getProducts();
      const cached = await cache.getProducts();

      expect(loaded.warnings.map((w) => w.code)).toEqual(['MALFORMED_RECORD']);
      expect(cached.warnings).toEqual([]);
      expect(cached.success && loaded.success && cached.data === loaded.data).toBe(true);
      expect(transport.callsTo(CATALOG_URL)).toBe(1);
      expect(cache.isLoaded).toBe(true);
    });

    it('retries on the next call after a failed load', async () => {
      transport.failOn(CATALOG_URL);

      const failed = await cache.getProducts();
      expect(failed.success).toBe(false);
      expect(!failed.success && failed.error.code).toBe('CATALOG_UNAVAILABLE');
      expect(cache.isLoaded).toBe(false);

      transport.recover(CATALOG_URL);
      const recovered = await cache.getProducts();

      expect(recovered.success).toBe(true);
      expect(transport.callsTo(CATALOG_URL)).toBe(2);
      expect(cache.isLoaded).toBe(true);
    });
  });

  describe('views', () => {
    const product: Product = {
      title: 'ACS 5-Year Detailed Tables',
      description: '',
      name: 'acs/acs5',
      vintageYears: [2019],
      datasetType: 'acs5',
      accessURL: 'http://api.census.gov/data/2019/acs/acs5',
      isMicrodata: false,
      isAggregate: true,
    };

    const state: GeographyLevel = {
      levelCode: '040',
      description: 'state',
      appliesTo: [{ product: product.title, years: [2019] }],
      requiredParentLevels: null,
    };

    it('stores a frozen copy of each view', () => {
      const listed = [product];
      cache.productsView = listed;
      listed.push({ ...product, accessURL: 'http://api.census.gov/data/2020/acs/acs5' });

      expect(cache.productsView).toHaveLength(1);
      expect(Object.isFrozen(cache.productsView)).toBe(true);
    });

    it('clears geography and variable views but keeps products', () => {
      cache.productsView = [product];
      cache.geographiesView = [state];
      cache.variablesView = [
        { name: 'B01001_001E', label: 'Total', concept: '', group: 'B01001', appliesTo: state.appliesTo },
      ];

      cache.clearDerivedViews();

      expect(cache.productsView).toHaveLength(1);
      expect(cache.geographiesView).toEqual([]);
      expect(cache.variablesView).toEqual([]);
    });
  });
});
