import request from 'supertest';
import app from '../../api/server';
import { simplePlanDocument } from '../fixtures/plans';

describe('GET /api', () => {
  it('should return API information', async () => {
    const response = await request(app).get('/api');

    expect(response.status).toBe(200);
    expect(response.body.message).toBe('Cashflow Projection API');
    expect(response.body.endpoints.projection).toBe('POST /api/projection');
  });
});

describe('GET /', () => {
  it('should return the same information as /api', async () => {
    const root = await request(app).get('/');
    const api = await request(app).get('/api');

    expect(root.status).toBe(200);
    expect(root.body).toEqual(api.body);
  });
});

describe('GET /api/health', () => {
  it('should return status ok with timestamp', async () => {
    const response = await request(app).get('/api/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('ok');
    expect(response.body.timestamp).toBeDefined();
  });
});

describe('GET /api/projection', () => {
  it('should return endpoint information', async () => {
    const response = await request(app).get('/api/projection');

    expect(response.status).toBe(200);
    expect(response.body.method).toBe('POST');
    expect(response.body.endpoint).toBe('/api/projection');
  });
});

describe('POST /api/projection', () => {
  it('should project the plan', async () => {
    const response = await request(app)
      .post('/api/projection')
      .send({ plan: simplePlanDocument, horizonYears: 2, currentYear: 2025 });

    expect(response.status).toBe(200);
    expect(response.body.years).toEqual([2025, 2026, 2027]);
    expect(response.body.profitSeries).toEqual([2600, 5200, 7800]);
    expect(response.body.investmentsSeries[0]).toBe(10000);
    expect(response.body.investmentsSeries[2]).toBeCloseTo(11025, 6);
  });

  it('should use the plan horizon when none is given', async () => {
    const response = await request(app)
      .post('/api/projection')
      .send({ plan: { ...simplePlanDocument, projection_horizon_years: 4 }, currentYear: 2025 });

    expect(response.status).toBe(200);
    expect(response.body.years).toEqual([2025, 2026, 2027, 2028, 2029]);
  });

  it('should fall back to the configured horizon', async () => {
    const previous = process.env.DEFAULT_HORIZON_YEARS;
    process.env.DEFAULT_HORIZON_YEARS = '3';
    try {
      const { projection_horizon_years, ...planWithoutHorizon } = simplePlanDocument;
      const response = await request(app)
        .post('/api/projection')
        .send({ plan: planWithoutHorizon, currentYear: 2025 });

      expect(projection_horizon_years).toBe(2);
      expect(response.status).toBe(200);
      expect(response.body.years).toEqual([2025, 2026, 2027, 2028]);
    } finally {
      if (previous === undefined) {
        delete process.env.DEFAULT_HORIZON_YEARS;
      } else {
        process.env.DEFAULT_HORIZON_YEARS = previous;
      }
    }
  });

  it('should return 400 for an oversized horizon', async () => {
    const response = await request(app)
      .post('/api/projection')
      .send({ plan: simplePlanDocument, horizonYears: 20000000, currentYear: 2025 });

    expect(response.status).toBe(400);
    expect(response.body.details).toEqual(['horizonYears: Number must be less than or equal to 150']);
  });

  it('should return 400 for an empty request', async () => {
    const response = await request(app).post('/api/projection').send({});

    expect(response.status).toBe(400);
    expect(response.body.error).toBe('Invalid projection request');
    expect(response.body.details).toEqual(['plan: Required']);
  });

  it('should return 400 for a malformed investment', async () => {
    const response = await request(app)
      .post('/api/projection')
      .send({
        plan: { investments: [{ name: 'A', balance: 'lots', interest_rate_percent: 5 }] },
      });

    expect(response.status).toBe(400);
    expect(response.body.details).toEqual([
      'plan.investments.0.balance: Expected number, received string',
    ]);
  });

  it('should return 400 for malformed JSON', async () => {
    const response = await request(app)
      .post('/api/projection')
      .set('Content-Type', 'application/json')
      .send('{"plan":');

    expect(response.status).toBe(400);
    expect(response.body.error).toBe('Bad request');
  });
});

describe('POST /api/assets', () => {
  it('should project total assets', async () => {
    const response = await request(app)
      .post('/api/assets')
      .send({
        plan: {
          investments: [{ name: 'Cash', balance: 2500, interest_rate_percent: 0 }],
          expenses: [{ name: 'Rent', expense: 1000, type: 'monthly' }],
          projection_years_main: 2,
        },
        currentYear: 2025,
      });

    expect(response.status).toBe(200);
    expect(response.body.years).toEqual([2025, 2026, 2027]);
    expect(response.body.totalAssets).toEqual([2500, -9500, -21500]);
  });
});

describe('POST /api/assets limits', () => {
  it('should return 400 for an oversized main horizon', async () => {
    const response = await request(app)
      .post('/api/assets')
      .send({ plan: { projection_years_main: 1000000 }, currentYear: 2025 });

    expect(response.status).toBe(400);
    expect(response.body.details).toEqual([
      'plan.projection_years_main: Number must be less than or equal to 150',
    ]);
  });
});

describe('POST /api/mortgage', () => {
  it('should return the monthly breakdown', async () => {
    const response = await request(app)
      .post('/api/mortgage')
      .send({
        mortgage: {
          home_price: 300000,
          downpayment: 60000,
          interest_rate_percent: 0,
          mortgage_duration_years: 20,
          annual_property_tax_percent: 1.2,
          start_year: 2026,
        },
      });

    expect(response.status).toBe(200);
    expect(response.body.principal).toBe(240000);
    expect(response.body.monthlyPrincipalAndInterest).toBe(1000);
    expect(response.body.totalMonthly).toBeCloseTo(1300, 6);
  });

  it('should return 400 without a mortgage', async () => {
    const response = await request(app).post('/api/mortgage').send({});

    expect(response.status).toBe(400);
    expect(response.body.error).toBe('Invalid mortgage request');
  });
});

describe('POST /api/validate', () => {
  it('should report counts and warnings for a valid document', async () => {
    const response = await request(app)
      .post('/api/validate')
      .send({
        ...simplePlanDocument,
        expenses: [{ name: 'Coffee', expense: 20, type: 'weekly' }],
      });

    expect(response.status).toBe(200);
    expect(response.body.valid).toBe(true);
    expect(response.body.counts).toEqual({
      investments: 1,
      incomes: 1,
      expenses: 1,
      people: 0,
      children: 0,
    });
    expect(response.body.warnings).toEqual([
      'expense "Coffee" has unknown type "weekly", counted once per active year',
    ]);
  });

  it('should list errors for an invalid document', async () => {
    const response = await request(app)
      .post('/api/validate')
      .send({ projection_horizon_years: 'ten' });

    expect(response.status).toBe(200);
    expect(response.body.valid).toBe(false);
    expect(response.body.errors).toEqual([
      'projection_horizon_years: Expected number, received string',
    ]);
  });
});
