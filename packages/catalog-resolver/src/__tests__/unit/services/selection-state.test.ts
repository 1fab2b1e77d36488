import { describe, it, expect, beforeEach } from 'vitest';
import {
  SelectionState,
  collectParentRequirements,
  groupVariablesByProduct,
} from '../../../services/selection-state.js';
import { SelectionInvariantError } from '../../../core/errors.js';
import type { GeographyLevel, Product, Variable } from '../../../core/types/index.js';

const TITLE = 'ACS 5-Year Detailed Tables';

function acs5(year: number): Product {
  return {
    title: TITLE,
    description: '',
    name: 'acs/acs5',
    vintageYears: [year],
    datasetType: 'acs5',
    accessURL: `http://api.census.gov/data/${year}/acs/acs5`,
    isMicrodata: false,
    isAggregate: true,
  };
}

function variable(name: string, years: number[]): Variable {
  return {
    name,
    label: name,
    concept: '',
    group: name.slice(0, 6),
    appliesTo: years.map((year) => ({ product: TITLE, years: [year] })),
  };
}

function level(levelCode: string, description: string, requires: string[] | null): GeographyLevel {
  return { levelCode, description, appliesTo: [], requiredParentLevels: requires };
}

describe('SelectionState', () => {
  let state: SelectionState;

  beforeEach(() => {
    state = new SelectionState();
  });

  it('starts empty', () => {
    expect(state.snapshot()).toEqual({ years: null, products: [], geographies: [], variables: [] });
    expect(state.hasProducts).toBe(false);
  });

  it('refuses geographies and variables before products', () => {
    expect(() => state.pinGeographies([level('040', 'state', null)])).toThrow(SelectionInvariantError);
    expect(() => state.pinVariables([variable('B01001_001E', [2019])])).toThrow(
      'Cannot pin variables before any product is pinned'
    );
  });

  it('refuses an empty product set', () => {
    expect(() => state.pinProducts([])).toThrow(SelectionInvariantError);
  });

  it('clears geographies and variables when products change', () => {
    state.pinProducts([acs5(2019)]);
    state.pinGeographies([level('040', 'state', null)]);
    state.pinVariables([variable('B01001_001E', [2019])]);

    state.pinProducts([acs5(2020)]);

    const snapshot = state.snapshot();
    expect(snapshot.products.map((p) => p.accessURL)).toEqual([
      'http://api.census.gov/data/2020/acs/acs5',
    ]);
    expect(snapshot.geographies).toEqual([]);
    expect(snapshot.variables).toEqual([]);
  });

  it('keeps years when products change', () => {
    state.setYears([2019, 2020]);
    state.pinProducts([acs5(2019)]);

    expect(state.getYears()).toEqual([2019, 2020]);
  });

  it('pins a copy that later changes to the input cannot reach', () => {
    const products = [acs5(2019)];
    state.pinProducts(products);
    products.push(acs5(2020));

    const snapshot = state.snapshot();
    expect(snapshot.products).toHaveLength(1);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.products)).toBe(true);
  });
});

describe('groupVariablesByProduct', () => {
  it('lists the pinned variables each product vintage serves', () => {
    const state = new SelectionState();
    state.pinProducts([acs5(2019), acs5(2020)]);
    state.pinVariables([
      variable('B19013_001E', [2019, 2020]),
      variable('B01001_001E', [2019]),
      variable('B25010_001E', [2020]),
    ]);

    expect(groupVariablesByProduct(state.snapshot())).toEqual([
      {
        product: TITLE,
        years: [2019],
        accessURL: 'http://api.census.gov/data/2019/acs/acs5',
        variables: ['B19013_001E', 'B01001_001E'],
      },
      {
        product: TITLE,
        years: [2020],
        accessURL: 'http://api.census.gov/data/2020/acs/acs5',
        variables: ['B19013_001E', 'B25010_001E'],
      },
    ]);
  });

  it('keeps products with no pinned variables', () => {
    const state = new SelectionState();
    state.pinProducts([acs5(2019)]);

    expect(groupVariablesByProduct(state.snapshot())[0]?.variables).toEqual([]);
  });
});

describe('collectParentRequirements', () => {
  it('unions requirements per description', () => {
    const requirements = collectParentRequirements([
      level('050', 'county', ['state']),
      level('040', 'state', null),
      level('051', 'county', ['state', 'county subdivision']),
    ]);

    expect([...requirements.entries()]).toEqual([
      ['county', ['state', 'county subdivision']],
      ['state', []],
    ]);
  });
});
