import { Readable } from 'stream';
import { S3Client, GetObjectCommand } from '@aws-sdk/client-s3';
import { DynamoDBClient, PutItemCommand } from '@aws-sdk/client-dynamodb';
import { sdkStreamMixin } from '@smithy/util-stream';
import { mockClient } from 'aws-sdk-client-mock';

import { recommend } from '../src/handler';
import {
  createRecommendationsHandler,
  resetDefaultDependencies,
  type GatewayResponse,
  type RecommendationsResult,
} from '../src/handlers/recommendations-handler';
import { resetConfigCache } from '../src/lib/config/loader';
import type { RecommendationStore } from '../src/lib/dynamo/recommendation-store';
import type { Recommendation, RecommendationRunResult } from '../src/lib/pricing/types';
import { parseCsvTable } from '../src/lib/reports/csv-table';
import type { ReportSource } from '../src/lib/reports/report-reader';

const RUN_TIME = '2026-01-15T10:00:00.000Z';

const INVENTORY_CSV = [
  'SKU,Product-Name,Available',
  'A1,Widget,90',
  'B2,Gadget,10',
  'C3,Gizmo,50',
].join('\n');

const SALES_CSV = [
  'SKU,Ordered Product Sales,Units Ordered',
  'A1,$500,2',
  'B2,$600,3',
  'D4,$100,1',
].join('\n');

class MemoryReports implements ReportSource {
  constructor(private readonly files: Record<string, string>) {}

  async read(key: string) {
    const text = this.files[key];
    if (text === undefined) {
      throw new Error(`NoSuchKey: ${key}`);
    }
    return parseCsvTable(text, key);
  }
}

class MemoryStore implements RecommendationStore {
  readonly items: Recommendation[] = [];

  constructor(private readonly failOnSku?: string) {}

  async put(record: Recommendation): Promise<void> {
    if (record.sku === this.failOnSku) {
      throw new Error('ConditionalCheckFailedException');
    }
    this.items.push(record);
  }
}

function isGatewayResponse(result: RecommendationsResult): result is GatewayResponse {
  return 'statusCode' in result;
}

function gatewayResponse(result: RecommendationsResult): GatewayResponse {
  if (!isGatewayResponse(result)) {
    throw new Error('expected a gateway response');
  }
  return result;
}

function runResult(result: RecommendationsResult): RecommendationRunResult {
  if (isGatewayResponse(result)) {
    throw new Error('expected a direct invocation result');
  }
  return result;
}

const payload = { inventory_s3_key: 'inventory.csv', sales_s3_key: 'sales.csv' };

describe('recommendations handler', () => {
  let store: MemoryStore;

  const build = (failOnSku?: string) => {
    store = new MemoryStore(failOnSku);
    return createRecommendationsHandler({
      reports: new MemoryReports({ 'inventory.csv': INVENTORY_CSV, 'sales.csv': SALES_CSV }),
      store,
      now: () => new Date(RUN_TIME),
    });
  };

  describe('gateway invocation', () => {
    it('should return recommendations for every matched sku', async () => {
      const handler = build();

      const response = gatewayResponse(
        await handler({ httpMethod: 'POST', body: JSON.stringify(payload) })
      );

      expect(response.statusCode).toBe(200);
      expect(response.headers).toEqual({ 'Content-Type': 'application/json' });

      const body = JSON.parse(response.body);
      expect(body.run_id).toBe(RUN_TIME);
      expect(body.sku_count).toBe(2);
      expect(body.recommendations).toEqual([
        {
          run_id: RUN_TIME,
          sku: 'A1',
          product_name: 'Widget',
          available: 90,
          units_ordered: 2,
          current_price: 250,
          gross_profit_unit: 167.5,
          strategy: 'clear_inventory',
          price_action: 'drop',
          price_change_pct: -0.1,
          ad_action: 'boost_low',
          reason: 'High inventory, low recent sales, healthy unit margin',
          created_at: RUN_TIME,
        },
        {
          run_id: RUN_TIME,
          sku: 'B2',
          product_name: 'Gadget',
          available: 10,
          units_ordered: 3,
          current_price: 200,
          gross_profit_unit: 134,
          strategy: 'premium_position',
          price_action: 'increase',
          price_change_pct: 0.05,
          ad_action: 'none',
          reason: 'Low inventory and strong margin; small price increase justified',
          created_at: RUN_TIME,
        },
      ]);
      expect(store.items.map((item) => item.sku)).toEqual(['A1', 'B2']);
    });

    it('should accept an already structured body', async () => {
      const response = gatewayResponse(await build()({ httpMethod: 'POST', body: payload }));

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body).sku_count).toBe(2);
    });

    it('should accept HTTP API events with base64 bodies', async () => {
      const response = gatewayResponse(
        await build()({
          requestContext: { http: { method: 'POST' } },
          isBase64Encoded: true,
          body: Buffer.from(JSON.stringify(payload)).toString('base64'),
        })
      );

      expect(response.statusCode).toBe(200);
    });

    it('should process methods other than POST the same way', async () => {
      const response = gatewayResponse(
        await build()({ httpMethod: 'PUT', body: JSON.stringify(payload) })
      );

      expect(response.statusCode).toBe(200);
    });

    it('should apply the requested cost price factor', async () => {
      const response = gatewayResponse(
        await build()({
          httpMethod: 'POST',
          body: JSON.stringify({ ...payload, cost_price_factor: '0.5' }),
        })
      );

      expect(JSON.parse(response.body).recommendations[0].gross_profit_unit).toBe(125);
    });

    it('should report missing fields as a 500 with a flat message', async () => {
      const response = gatewayResponse(
        await build()({ httpMethod: 'POST', body: JSON.stringify({ inventory_s3_key: 'inventory.csv' }) })
      );

      expect(response).toEqual({
        statusCode: 500,
        body: JSON.stringify({ error: 'Validation error: sales_s3_key is required' }),
      });
    });

    it('should treat an empty body as an empty payload', async () => {
      const response = gatewayResponse(await build()({ httpMethod: 'POST', body: null }));

      expect(JSON.parse(response.body)).toEqual({
        error: 'Validation error: inventory_s3_key is required; sales_s3_key is required',
      });
    });

    it('should reject a body that is not JSON', async () => {
      const response = gatewayResponse(await build()({ httpMethod: 'POST', body: '{not json' }));

      expect(response.statusCode).toBe(500);
      expect(JSON.parse(response.body).error).toMatch(/^Invalid JSON in request body: /);
    });

    it('should report a missing report as a 500', async () => {
      const response = gatewayResponse(
        await build()({
          httpMethod: 'POST',
          body: JSON.stringify({ ...payload, sales_s3_key: 'missing.csv' }),
        })
      );

      expect(response).toEqual({
        statusCode: 500,
        body: JSON.stringify({ error: 'NoSuchKey: missing.csv' }),
      });
      expect(store.items).toEqual([]);
    });

    it('should stop at the first failed write and keep earlier ones', async () => {
      const response = gatewayResponse(
        await build('B2')({ httpMethod: 'POST', body: JSON.stringify(payload) })
      );

      expect(response).toEqual({
        statusCode: 500,
        body: JSON.stringify({ error: 'ConditionalCheckFailedException' }),
      });
      expect(store.items.map((item) => item.sku)).toEqual(['A1']);
    });
  });

  describe('direct invocation', () => {
    it('should return the run result unwrapped', async () => {
      const result = runResult(await build()(payload));

      expect(result.run_id).toBe(RUN_TIME);
      expect(result.sku_count).toBe(2);
      expect(result.recommendations.map((item) => item.strategy)).toEqual([
        'clear_inventory',
        'premium_position',
      ]);
    });

    it('should rethrow failures', async () => {
      await expect(build()({ sales_s3_key: 'sales.csv' })).rejects.toThrow(
        'Validation error: inventory_s3_key is required'
      );
    });

    it('should produce the same recommendations on a re-run', async () => {
      const handler = build();

      const first = runResult(await handler(payload));
      const second = runResult(await handler(payload));

      expect(second.recommendations).toEqual(first.recommendations);
    });
  });
});

describe('recommend (AWS wiring)', () => {
  const s3Mock = mockClient(S3Client);
  const dynamoMock = mockClient(DynamoDBClient);

  const files: Record<string, string> = {
    'reports/inventory.csv': INVENTORY_CSV,
    'reports/sales.csv': SALES_CSV,
  };

  beforeEach(() => {
    s3Mock.reset();
    dynamoMock.reset();
    resetConfigCache();
    resetDefaultDependencies();

    s3Mock.on(GetObjectCommand).callsFake((input) => ({
      Body: sdkStreamMixin(Readable.from([Buffer.from(files[input.Key ?? ''] ?? '', 'utf-8')])),
    }));
    dynamoMock.on(PutItemCommand).resolves({});
  });

  it('should read reports from the configured bucket and write to the configured table', async () => {
    const result = runResult(
      await recommend({ inventory_s3_key: 'reports/inventory.csv', sales_s3_key: 'reports/sales.csv' })
    );

    expect(result.sku_count).toBe(2);

    const reads = s3Mock.commandCalls(GetObjectCommand).map((call) => call.args[0].input);
    expect(reads).toEqual([
      { Bucket: 'test-reports-bucket', Key: 'reports/inventory.csv' },
      { Bucket: 'test-reports-bucket', Key: 'reports/sales.csv' },
    ]);

    const writes = dynamoMock.commandCalls(PutItemCommand).map((call) => call.args[0].input);
    expect(writes.map((input) => input.TableName)).toEqual(['test-recommendations', 'test-recommendations']);
    expect(writes.map((input) => input.Item?.sku)).toEqual([{ S: 'A1' }, { S: 'B2' }]);
    expect(writes[0].Item?.gross_profit_unit).toEqual({ N: '167.5' });
  });

  it('should wrap storage failures for gateway callers', async () => {
    dynamoMock.on(PutItemCommand).rejects(new Error('AccessDeniedException'));

    const response = gatewayResponse(
      await recommend({
        httpMethod: 'POST',
        body: JSON.stringify({ inventory_s3_key: 'reports/inventory.csv', sales_s3_key: 'reports/sales.csv' }),
      })
    );

    expect(response).toEqual({
      statusCode: 500,
      body: JSON.stringify({ error: 'AccessDeniedException' }),
    });
    expect(dynamoMock.commandCalls(PutItemCommand)).toHaveLength(1);
  });
});
