/**
 * Catalog fixtures: a small product catalog plus geography and variable
 * documents for three of its products.
 */

export const CATALOG_URL = 'https://api.census.gov/data.json';

export const ACS5_TITLE = 'ACS 5-Year Detailed Tables';
export const ACS1_TITLE = 'ACS 1-Year Detailed Tables';
export const CPS_TITLE = 'CPS Basic Monthly';
export const POVERTY_TITLE = 'Poverty Time Series';
export const FLOWS_TITLE = 'ACS Flows 5-Year';

export const ACS5_2019_URL = 'http://api.census.gov/data/2019/acs/acs5';
export const ACS5_2020_URL = 'http://api.census.gov/data/2020/acs/acs5';
export const ACS1_2019_URL = 'http://api.census.gov/data/2019/acs/acs1';
export const CPS_2019_URL = 'http://api.census.gov/data/2019/cps/basic/jan';
export const POVERTY_URL = 'http://api.census.gov/data/timeseries/poverty/saipe';
export const FLOWS_URL = 'http://api.census.gov/data/2019/acs/flows';

export const catalogDocument = {
  '@context': 'https://project-open-data.cio.gov/v1.1/schema/catalog.jsonld',
  dataset: [
    {
      title: ACS5_TITLE,
      description: 'Detailed tables, five-year estimates',
      c_vintage: 2019,
      c_dataset: ['acs', 'acs5'],
      c_isAggregate: true,
      distribution: [{ accessURL: ACS5_2019_URL, format: 'API' }],
    },
    {
      title: ACS5_TITLE,
      description: 'Detailed tables, five-year estimates',
      c_vintage: 2020,
      c_dataset: ['acs', 'acs5'],
      c_isAggregate: true,
      distribution: [{ accessURL: ACS5_2020_URL, format: 'API' }],
    },
    {
      title: ACS1_TITLE,
      description: 'Detailed tables, one-year estimates',
      c_vintage: '2019',
      c_dataset: ['acs', 'acs1'],
      c_isAggregate: true,
      distribution: [{ accessURL: ACS1_2019_URL }],
    },
    {
      title: CPS_TITLE,
      description: 'Monthly labor force microdata',
      c_vintage: 2019,
      c_dataset: ['cps', 'basic', 'jan'],
      c_isMicrodata: true,
      distribution: [
        { accessURL: 'https://www2.census.gov/programs-surveys/cps/datasets' },
        { accessURL: CPS_2019_URL },
      ],
    },
    {
      title: POVERTY_TITLE,
      description: 'Small area poverty estimates',
      c_dataset: ['timeseries', 'poverty', 'saipe'],
      c_isAggregate: true,
      distribution: [{ accessURL: POVERTY_URL }],
    },
    {
      title: FLOWS_TITLE,
      description: 'County-to-county migration flows',
      c_vintage: '2015-2019',
      c_dataset: ['acs', 'flows'],
      c_isAggregate: true,
      distribution: [{ accessURL: FLOWS_URL }],
    },
    {
      title: 'Decennial Download Only',
      description: 'Not served by the API',
      c_vintage: 2020,
      c_dataset: ['dec', 'pl'],
      distribution: [{ accessURL: 'https://www2.census.gov/census_2020/01-Redistricting_File' }],
    },
    {
      description: 'Entry with no title',
      c_vintage: 2019,
      distribution: [{ accessURL: 'http://api.census.gov/data/2019/untitled' }],
    },
  ],
};

export const acs5Geography2019 = {
  fips: [
    { name: 'us', geoLevelDisplay: '010', referenceDate: '2019-01-01' },
    { name: 'state', geoLevelDisplay: '040', referenceDate: '2019-01-01' },
    { name: 'county', geoLevelDisplay: '050', referenceDate: '2019-01-01', requires: ['state'] },
    { name: 'place', geoLevelDisplay: '160', referenceDate: '2019-01-01', requires: ['state'] },
  ],
};

export const acs5Geography2020 = {
  fips: [
    { name: 'state', geoLevelDisplay: '040', referenceDate: '2020-01-01' },
    { name: 'county', geoLevelDisplay: '050', referenceDate: '2020-01-01', requires: ['state'] },
    {
      name: 'tract',
      geoLevelDisplay: '140',
      referenceDate: '2020-01-01',
      requires: ['state', 'county'],
    },
  ],
};

export const acs1Geography2019 = {
  fips: [
    { name: 'state', geoLevelId: '040' },
    { name: 'no level code' },
  ],
};

export const acs5Variables2019 = {
  variables: {
    GEO_ID: { label: 'Geography', concept: 'GEOGRAPHY' },
    for: { label: "Census API FIPS 'for' clause", concept: 'Census API Geography Specification' },
    in: { label: "Census API FIPS 'in' clause", concept: 'Census API Geography Specification' },
    B01001_001E: { label: 'Estimate!!Total:', concept: 'SEX BY AGE', group: 'B01001' },
    B19013_001E: {
      label: 'Estimate!!Median household income in the past 12 months',
      concept: 'MEDIAN HOUSEHOLD INCOME',
      group: 'B19013',
    },
    B19301_001E: {
      label: 'Estimate!!Per capita income in the past 12 months',
      concept: 'PER CAPITA INCOME',
      group: 'B19301',
    },
  },
};

export const acs5Variables2020 = {
  variables: {
    GEO_ID: { label: 'Geography', concept: 'GEOGRAPHY' },
    B19013_001E: {
      label: 'Estimate!!Median household income in the past 12 months',
      concept: 'MEDIAN HOUSEHOLD INCOME',
      group: 'B19013',
    },
    B25010_001E: { label: 'Estimate!!Average household size', concept: 'AVERAGE HOUSEHOLD SIZE' },
  },
};

export function catalogDocuments(): Record<string, unknown> {
  return {
    [CATALOG_URL]: catalogDocument,
    [`${ACS5_2019_URL}/geography.json`]: acs5Geography2019,
    [`${ACS5_2020_URL}/geography.json`]: acs5Geography2020,
    [`${ACS1_2019_URL}/geography.json`]: acs1Geography2019,
    [`${ACS5_2019_URL}/variables.json`]: acs5Variables2019,
    [`${ACS5_2020_URL}/variables.json`]: acs5Variables2020,
  };
}
