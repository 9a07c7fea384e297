import type { Knex } from 'knex';
import { BaseService, ListOptions } from './base.service';
import { NotFoundError } from '../lib/errors';
import { moduleLogger } from '../lib/logger';
import { toTimestamp } from '../lib/format';
import { requireContact, requireId, requireText } from '../lib/validation';
import type { Vendor } from '../../shared/types';

const log = moduleLogger('vendors');

export interface CreateVendorInput {
  name: string;
  contact: string;
}

interface VendorRow {
  id: number;
  name: string;
  contact: string;
  created_at: unknown;
}

class VendorService extends BaseService<VendorRow, Vendor> {
  constructor() {
    super('vendors');
  }

  protected toEntity(row: VendorRow): Vendor {
    return {
      id: row.id,
      name: row.name,
      contact: row.contact,
      created_at: toTimestamp(row.created_at),
    };
  }

  async createVendor(input: CreateVendorInput): Promise<Vendor> {
    const name = requireText(input.name, 'name');
    const contact = requireContact(input.contact);

    const vendor = await this.inTransaction('create vendor', (trx) =>
      this.insertRow(trx, { name, contact })
    );
    log.info({ vendorId: vendor.id }, 'Vendor registered');
    return vendor;
  }

  async listVendors(options: Pick<ListOptions, 'page' | 'limit' | 'search'> = {}) {
    return this.list({
      ...options,
      limit: options.limit ?? 500,
      searchFields: ['name', 'contact'],
      sortBy: 'name',
      sortOrder: 'asc',
    });
  }

  /** Every vendor, by name. Reports walk this list. */
  async allVendors(db: Knex = this.db): Promise<Vendor[]> {
    const rows: VendorRow[] = await db('vendors').select('*').orderBy('name', 'asc').orderBy('id', 'asc');
    return rows.map((row) => this.toEntity(row));
  }

  async getVendor(id: number): Promise<Vendor> {
    requireId(id, 'vendor_id');
    const vendor = await this.read('get vendor', (db) => this.getById(id, db));
    if (!vendor) throw new NotFoundError('Vendor', id);
    return vendor;
  }

  /** Existence check for writers; runs on the caller's transaction. */
  async requireVendor(trx: Knex.Transaction, id: number): Promise<Vendor> {
    requireId(id, 'vendor_id');
    const vendor = await this.getById(id, trx);
    if (!vendor) throw new NotFoundError('Vendor', id);
    return vendor;
  }
}

export const vendorService = new VendorService();
