/**
 * PRODUCTION EFFECTS IMPLEMENTATION
 *
 * This file contains the real implementations that connect to actual services:
 * - PostgreSQL for discounts, listings, stores, catalog, users and requests
 * - SMTP (nodemailer) for content manager notifications
 * - CloudWatch metrics and SNS alerts for pricing integrity problems
 */
import {
  Category,
  IsoDate,
  Permission,
  Product,
  ProductDiscount,
  ProductRequest,
  SellerAccessRequest,
  SellerProduct,
  Store,
  User,
} from '../domain';
import {NotificationPayload} from '../types';
import {IntegrityAlert, ProductRequestInput, SellerProductChanges, SellerProductInput} from '../pure/types';
import {
  AppEffects,
  AuthorizationService,
  CatalogRepository,
  DiscountRepository,
  MonitoringService,
  NotificationService,
  RequestRepository,
  SellerProductRepository,
  StoreRepository,
  UserRepository,
} from '../pure/effects';
import {AwsConfig, EmailConfig, ProductionConfig} from './types';
import {describeIntegrityAlert} from '../pure/businessLogic';
import {Pool} from 'pg';
import nodemailer, {Transporter} from 'nodemailer';
import {CloudWatchClient, PutMetricDataCommand} from '@aws-sdk/client-cloudwatch';
import {PublishCommand, SNSClient} from '@aws-sdk/client-sns';

// ============================================================================
// Configuration
// ============================================================================

// Load configuration from environment variables
export function loadConfigFromEnv(): ProductionConfig {
  const region = process.env.AWS_DEFAULT_REGION || 'us-east-1';
  return {
    database: {
      host: process.env.DATABASE_HOST || 'localhost',
      port: parseInt(process.env.DATABASE_PORT || '5432', 10),
      user: process.env.DATABASE_USER || 'appuser',
      password: process.env.DATABASE_PASSWORD || 'apppassword',
      database: process.env.DATABASE_NAME || 'storefront',
    },
    email: {
      host: process.env.SMTP_HOST || 'localhost',
      port: parseInt(process.env.SMTP_PORT || '1025', 10),
      from: process.env.MAIL_FROM || '"Storefront" <noreply@example.com>',
    },
    aws: {
      region,
      accessKeyId: process.env.AWS_ACCESS_KEY_ID || 'test',
      secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY || 'test',
      monitoringEndpoint: process.env.AWS_ENDPOINT_MONITORING || 'http://localhost:4566',
      alertsTopicArn: process.env.AWS_ALERTS_TOPIC_ARN
        || `arn:aws:sns:${region}:000000000000:storefront-pricing-alerts`,
    },
  };
}

// Group membership that grants each permission
const PERMISSION_GROUPS: Record<Permission, string> = {
  sellers: 'Sellers',
  content_manager: 'Content-manager',
};

// ============================================================================
// Row Mapping
// ============================================================================

type DiscountRow = {
  id: string;
  slug: string;
  title: string;
  description: string;
  kind: ProductDiscount['kind'];
  value: string;
  valid_from: IsoDate;
  valid_to: IsoDate;
  is_active: boolean;
  store_wide: boolean;
  store_id: string | null;
};

type SellerProductRow = {
  id: string;
  product_id: string;
  product_name: string;
  store_id: string;
  price: string;
  quantity: number;
  discount_id: string | null;
};

type StoreRow = {
  id: string;
  slug: string;
  title: string;
  description: string;
  owner_id: string;
  email: string;
  phone: string | null;
};

type UserRow = {
  id: string;
  email: string;
  username: string | null;
  groups: string[];
};

const toDiscount = (row: DiscountRow): ProductDiscount => ({
  id: row.id,
  slug: row.slug,
  title: row.title,
  description: row.description,
  kind: row.kind,
  value: parseFloat(row.value),
  validFrom: row.valid_from,
  validTo: row.valid_to,
  isActive: row.is_active,
  storeWide: row.store_wide,
  storeId: row.store_id,
});

const toSellerProduct = (row: SellerProductRow): SellerProduct => ({
  id: row.id,
  productId: row.product_id,
  productName: row.product_name,
  storeId: row.store_id,
  price: parseFloat(row.price),
  quantity: row.quantity,
  discountId: row.discount_id,
});

const toStore = (row: StoreRow): Store => ({
  id: row.id,
  slug: row.slug,
  title: row.title,
  description: row.description,
  ownerId: row.owner_id,
  email: row.email,
  phone: row.phone,
});

const toUser = (row: UserRow): User => ({
  id: row.id,
  email: row.email,
  username: row.username,
  groups: row.groups,
});

// ============================================================================
// PostgreSQL Discount Repository
// ============================================================================

const DISCOUNT_COLUMNS = `
  id, slug, title, description, kind, value,
  to_char(valid_from, 'YYYY-MM-DD') AS valid_from,
  to_char(valid_to, 'YYYY-MM-DD') AS valid_to,
  is_active, store_wide, store_id`;

class PostgresDiscountRepository implements DiscountRepository {
  constructor(private pool: Pool) {}

  async getCurrent(today: IsoDate): Promise<ProductDiscount[]> {
    const result = await this.pool.query<DiscountRow>(
      `SELECT ${DISCOUNT_COLUMNS} FROM product_discounts
       WHERE is_active AND valid_from <= $1::date AND valid_to >= $1::date
       ORDER BY valid_to, id`,
      [today]
    );
    return result.rows.map(toDiscount);
  }

  async getBySlug(slug: string): Promise<ProductDiscount | null> {
    const result = await this.pool.query<DiscountRow>(
      `SELECT ${DISCOUNT_COLUMNS} FROM product_discounts WHERE slug = $1`,
      [slug]
    );
    return result.rows.length === 0 ? null : toDiscount(result.rows[0]);
  }

  async getByIds(ids: string[]): Promise<Record<string, ProductDiscount>> {
    if (ids.length === 0) {
      return {};
    }

    const result = await this.pool.query<DiscountRow>(
      `SELECT ${DISCOUNT_COLUMNS} FROM product_discounts WHERE id = ANY($1)`,
      [ids]
    );

    const discounts: Record<string, ProductDiscount> = {};
    for (const row of result.rows) {
      discounts[row.id] = toDiscount(row);
    }
    return discounts;
  }
}

// ============================================================================
// PostgreSQL Seller Product Repository
// ============================================================================

// Store-wide discounts cover whole stores rather than linked listings
function listingFilterFor(discount: ProductDiscount): { condition: string; params: string[] } {
  if (!discount.storeWide) {
    return {condition: 'sp.discount_id = $1', params: [discount.id]};
  }
  return discount.storeId === null
    ? {condition: 'TRUE', params: []}
    : {condition: 'sp.store_id = $1', params: [discount.storeId]};
}

const LISTING_COLUMNS = `
  sp.id, sp.product_id, p.name AS product_name, sp.store_id,
  sp.price, sp.quantity, sp.discount_id`;

class PostgresSellerProductRepository implements SellerProductRepository {
  constructor(private pool: Pool) {}

  async getById(id: string): Promise<SellerProduct | null> {
    const result = await this.pool.query<SellerProductRow>(
      `SELECT ${LISTING_COLUMNS} FROM seller_products sp
       JOIN products p ON p.id = sp.product_id
       WHERE sp.id = $1`,
      [id]
    );
    return result.rows.length === 0 ? null : toSellerProduct(result.rows[0]);
  }

  async getByStores(storeIds: string[]): Promise<SellerProduct[]> {
    if (storeIds.length === 0) {
      return [];
    }

    const result = await this.pool.query<SellerProductRow>(
      `SELECT ${LISTING_COLUMNS} FROM seller_products sp
       JOIN products p ON p.id = sp.product_id
       WHERE sp.store_id = ANY($1)
       ORDER BY sp.id`,
      [storeIds]
    );
    return result.rows.map(toSellerProduct);
  }

  async getByDiscount(discount: ProductDiscount): Promise<SellerProduct[]> {
    const {condition, params} = listingFilterFor(discount);

    const result = await this.pool.query<SellerProductRow>(
      `SELECT ${LISTING_COLUMNS} FROM seller_products sp
       JOIN products p ON p.id = sp.product_id
       WHERE ${condition}
       ORDER BY sp.id`,
      params
    );
    return result.rows.map(toSellerProduct);
  }

  async existsInStore(storeId: string, productId: string): Promise<boolean> {
    const result = await this.pool.query(
      'SELECT 1 FROM seller_products WHERE store_id = $1 AND product_id = $2',
      [storeId, productId]
    );
    return result.rows.length > 0;
  }

  async create(input: SellerProductInput): Promise<SellerProduct | null> {
    const result = await this.pool.query<SellerProductRow>(
      `WITH sp AS (
         INSERT INTO seller_products (store_id, product_id, price, quantity, discount_id)
         VALUES ($1, $2, $3, $4, $5)
         ON CONFLICT (store_id, product_id) DO NOTHING
         RETURNING *
       )
       SELECT ${LISTING_COLUMNS} FROM sp JOIN products p ON p.id = sp.product_id`,
      [input.storeId, input.productId, input.price, input.quantity, input.discountId]
    );
    return result.rows.length === 0 ? null : toSellerProduct(result.rows[0]);
  }

  async update(id: string, changes: SellerProductChanges): Promise<SellerProduct> {
    const result = await this.pool.query<SellerProductRow>(
      `WITH sp AS (
         UPDATE seller_products SET price = $2, quantity = $3, discount_id = $4
         WHERE id = $1
         RETURNING *
       )
       SELECT ${LISTING_COLUMNS} FROM sp JOIN products p ON p.id = sp.product_id`,
      [id, changes.price, changes.quantity, changes.discountId]
    );
    if (result.rows.length === 0) {
      throw new Error(`Seller product ${id} disappeared during update`);
    }
    return toSellerProduct(result.rows[0]);
  }

  async remove(id: string): Promise<void> {
    await this.pool.query('DELETE FROM seller_products WHERE id = $1', [id]);
  }
}

// ============================================================================
// PostgreSQL Store & Catalog Repositories
// ============================================================================

const STORE_COLUMNS = 'id, slug, title, description, owner_id, email, phone';

class PostgresStoreRepository implements StoreRepository {
  constructor(private pool: Pool) {}

  async getById(id: string): Promise<Store | null> {
    const result = await this.pool.query<StoreRow>(`SELECT ${STORE_COLUMNS} FROM stores WHERE id = $1`, [id]);
    return result.rows.length === 0 ? null : toStore(result.rows[0]);
  }

  async getBySlug(slug: string): Promise<Store | null> {
    const result = await this.pool.query<StoreRow>(`SELECT ${STORE_COLUMNS} FROM stores WHERE slug = $1`, [slug]);
    return result.rows.length === 0 ? null : toStore(result.rows[0]);
  }

  async getByOwner(userId: string): Promise<Store[]> {
    const result = await this.pool.query<StoreRow>(
      `SELECT ${STORE_COLUMNS} FROM stores WHERE owner_id = $1 ORDER BY id`,
      [userId]
    );
    return result.rows.map(toStore);
  }
}

class PostgresCatalogRepository implements CatalogRepository {
  constructor(private pool: Pool) {}

  async getCategories(): Promise<Category[]> {
    const result = await this.pool.query<{ id: string; title: string; parent_id: string | null }>(
      'SELECT id, title, parent_id FROM categories ORDER BY title, id'
    );
    return result.rows.map(row => ({id: row.id, title: row.title, parentId: row.parent_id}));
  }

  async getCategoryById(id: string): Promise<Category | null> {
    const result = await this.pool.query<{ id: string; title: string; parent_id: string | null }>(
      'SELECT id, title, parent_id FROM categories WHERE id = $1',
      [id]
    );
    if (result.rows.length === 0) {
      return null;
    }
    const row = result.rows[0];
    return {id: row.id, title: row.title, parentId: row.parent_id};
  }

  async getProducts(categoryId: string | null): Promise<Product[]> {
    const result = await this.pool.query<{ id: string; name: string; category_id: string }>(
      `SELECT id, name, category_id FROM products
       WHERE $1::bigint IS NULL OR category_id = $1::bigint
       ORDER BY name, id`,
      [categoryId]
    );
    return result.rows.map(row => ({id: row.id, name: row.name, categoryId: row.category_id}));
  }

  async getProductById(id: string): Promise<Product | null> {
    const result = await this.pool.query<{ id: string; name: string; category_id: string }>(
      'SELECT id, name, category_id FROM products WHERE id = $1',
      [id]
    );
    if (result.rows.length === 0) {
      return null;
    }
    const row = result.rows[0];
    return {id: row.id, name: row.name, categoryId: row.category_id};
  }
}

// ============================================================================
// PostgreSQL Users, Requests & Authorization
// ============================================================================

const USER_SELECT = `
  SELECT u.id, u.email, u.username,
         COALESCE(array_agg(g.name) FILTER (WHERE g.name IS NOT NULL), '{}') AS groups
  FROM users u
  LEFT JOIN user_groups ug ON ug.user_id = u.id
  LEFT JOIN groups g ON g.id = ug.group_id`;

class PostgresUserRepository implements UserRepository {
  constructor(private pool: Pool) {}

  async getById(id: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `${USER_SELECT} WHERE u.id = $1 GROUP BY u.id`,
      [id]
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async getContentManagers(): Promise<User[]> {
    const result = await this.pool.query<UserRow>(
      `${USER_SELECT}
       WHERE u.is_active AND EXISTS (
         SELECT 1 FROM user_groups m JOIN groups mg ON mg.id = m.group_id
         WHERE m.user_id = u.id AND mg.name = $1
       )
       GROUP BY u.id
       ORDER BY u.id`,
      [PERMISSION_GROUPS.content_manager]
    );
    return result.rows.map(toUser);
  }
}

class PostgresRequestRepository implements RequestRepository {
  constructor(private pool: Pool) {}

  async createProductRequest(userId: string, input: ProductRequestInput): Promise<ProductRequest> {
    const result = await this.pool.query<{ id: string; created_at: Date }>(
      `INSERT INTO product_requests (store_id, requested_by, name, category_id, description)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING id, created_at`,
      [input.storeId, userId, input.name, input.categoryId, input.description]
    );
    const row = result.rows[0];
    return {
      id: row.id,
      storeId: input.storeId,
      requestedBy: userId,
      name: input.name,
      categoryId: input.categoryId,
      description: input.description,
      createdAt: row.created_at.toISOString(),
    };
  }

  async createSellerAccessRequest(userId: string): Promise<SellerAccessRequest> {
    const result = await this.pool.query<{ id: string; created_at: Date }>(
      'INSERT INTO seller_access_requests (user_id) VALUES ($1) RETURNING id, created_at',
      [userId]
    );
    const row = result.rows[0];
    return {id: row.id, userId, createdAt: row.created_at.toISOString()};
  }
}

class PostgresAuthorizationService implements AuthorizationService {
  constructor(private pool: Pool) {}

  async hasPermission(userId: string, permission: Permission): Promise<boolean> {
    const result = await this.pool.query(
      `SELECT 1 FROM users u
       LEFT JOIN user_groups ug ON ug.user_id = u.id
       LEFT JOIN groups g ON g.id = ug.group_id
       WHERE u.id = $1 AND u.is_active AND (u.is_superuser OR g.name = $2)
       LIMIT 1`,
      [userId, PERMISSION_GROUPS[permission]]
    );
    return result.rows.length > 0;
  }
}

// ============================================================================
// Nodemailer Notification Service
// ============================================================================

class NodemailerNotificationService implements NotificationService {
  private transporter: Transporter;

  constructor(private config: EmailConfig) {
    this.transporter = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: false,
      ignoreTLS: true,
    });
  }

  async sendEmail(payload: NotificationPayload): Promise<void> {
    try {
      await this.transporter.sendMail({
        from: this.config.from,
        to: payload.to,
        subject: payload.subject,
        text: payload.body,
      });
      console.log(`Email sent to ${payload.to}: ${payload.subject}`);
    } catch (error) {
      console.error('Failed to send email:', error);
      throw new Error('Email service unavailable');
    }
  }
}

// ============================================================================
// CloudWatch Monitoring Service (CloudWatch + SNS)
// ============================================================================

class CloudWatchMonitoringService implements MonitoringService {
  private cloudwatch: CloudWatchClient;
  private sns: SNSClient;

  constructor(private config: AwsConfig) {
    const clientConfig = {
      region: config.region,
      endpoint: config.monitoringEndpoint,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
    };
    this.cloudwatch = new CloudWatchClient(clientConfig);
    this.sns = new SNSClient(clientConfig);
  }

  async sendAlerts(alerts: IntegrityAlert[]): Promise<void> {
    if (alerts.length === 0) {
      return;
    }

    try {
      const invalidPrices = alerts.filter(alert => alert.type === 'invalid_price').length;
      await this.cloudwatch.send(new PutMetricDataCommand({
        Namespace: 'Storefront/Pricing',
        MetricData: [
          {MetricName: 'InvalidPrices', Value: invalidPrices, Unit: 'Count', Timestamp: new Date()},
          {MetricName: 'InvalidDiscounts', Value: alerts.length - invalidPrices, Unit: 'Count', Timestamp: new Date()},
        ],
      }));

      await this.sns.send(new PublishCommand({
        TopicArn: this.config.alertsTopicArn,
        Subject: 'Storefront Pricing Alert: Invalid Pricing Data',
        Message: `The following pricing data was skipped while rendering:\n\n${alerts.map(describeIntegrityAlert).join('\n')}`,
      }));

      console.log(`Sent ${alerts.length} pricing integrity alerts to monitoring service`);
    } catch (error) {
      console.error('Failed to send monitoring alerts:', error);
      throw new Error('Monitoring service unavailable');
    }
  }
}

// ============================================================================
// Production EffectsFactory
// ============================================================================

class EffectsFactory implements AppEffects {
  private _pool?: Pool;
  private _discounts?: DiscountRepository;
  private _sellerProducts?: SellerProductRepository;
  private _stores?: StoreRepository;
  private _catalog?: CatalogRepository;
  private _users?: UserRepository;
  private _requests?: RequestRepository;
  private _authorization?: AuthorizationService;
  private _notifications?: NotificationService;
  private _monitoring?: MonitoringService;

  constructor(private config: ProductionConfig) {}

  private async getPool(): Promise<Pool> {
    if (!this._pool) {
      this._pool = new Pool({
        host: this.config.database.host,
        port: this.config.database.port,
        user: this.config.database.user,
        password: this.config.database.password,
        database: this.config.database.database,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
      });

      // Test database connection
      try {
        const client = await this._pool.connect();
        console.log('✅ Connected to PostgreSQL');
        client.release();
      } catch (error) {
        console.error('❌ Failed to connect to PostgreSQL:', error);
        throw error;
      }
    }
    return this._pool;
  }

  // Synchronous access requires the pool to be already initialized
  private get pool(): Pool {
    if (!this._pool) {
      throw new Error('Database pool not initialized. Call initialize() first.');
    }
    return this._pool;
  }

  get discounts(): DiscountRepository {
    if (!this._discounts) {
      this._discounts = new PostgresDiscountRepository(this.pool);
    }
    return this._discounts;
  }

  get sellerProducts(): SellerProductRepository {
    if (!this._sellerProducts) {
      this._sellerProducts = new PostgresSellerProductRepository(this.pool);
    }
    return this._sellerProducts;
  }

  get stores(): StoreRepository {
    if (!this._stores) {
      this._stores = new PostgresStoreRepository(this.pool);
    }
    return this._stores;
  }

  get catalog(): CatalogRepository {
    if (!this._catalog) {
      this._catalog = new PostgresCatalogRepository(this.pool);
    }
    return this._catalog;
  }

  get users(): UserRepository {
    if (!this._users) {
      this._users = new PostgresUserRepository(this.pool);
    }
    return this._users;
  }

  get requests(): RequestRepository {
    if (!this._requests) {
      this._requests = new PostgresRequestRepository(this.pool);
    }
    return this._requests;
  }

  get authorization(): AuthorizationService {
    if (!this._authorization) {
      this._authorization = new PostgresAuthorizationService(this.pool);
    }
    return this._authorization;
  }

  get notifications(): NotificationService {
    if (!this._notifications) {
      this._notifications = new NodemailerNotificationService(this.config.email);
    }
    return this._notifications;
  }

  get monitoring(): MonitoringService {
    if (!this._monitoring) {
      this._monitoring = new CloudWatchMonitoringService(this.config.aws);
    }
    return this._monitoring;
  }

  /**
   * Initialize the PostgreSQL pool.
   * Must be called before using the effects
   */
  async initialize(): Promise<void> {
    await this.getPool();
    console.log('✅ All production effects initialized');
  }

  async close(): Promise<void> {
    await this._pool?.end();
  }

  /**
   * Static factory method to create and initialize production effects
   */
  static async make(config?: ProductionConfig): Promise<EffectsFactory> {
    const effects = new EffectsFactory(config || loadConfigFromEnv());
    await effects.initialize();
    return effects;
  }
}

export type ProductionEffects = AppEffects & { close(): Promise<void> };

// Export a factory function
export async function makeAppEffects(config?: ProductionConfig): Promise<ProductionEffects> {
  return EffectsFactory.make(config);
}
