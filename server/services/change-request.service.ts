// =============================================================
// File: server/services/change-request.service.ts
// Module: Change-Request Workflow
// Description: Two-phase edits of recorded sales.
//   - submit()  → snapshot the sale as the requester saw it plus
//                 the proposed values; the sale is not touched
//   - approve() → admin only; apply the proposed values (totals
//                 recomputed) and freeze the request
//   - reject()  → admin only, reason required; sale untouched
//   - queue reads: by status / requester, counts, detail + diff
//
// pending → approved | rejected. Terminal states never change;
// a rejected edit is resubmitted as a new request. Review runs
// under a row lock on the request so two reviewers cannot both
// act on it. Approval does not adjust stock lots.
// =============================================================

import type { Knex } from 'knex';
import { BaseService } from './base.service';
import { changedFields, mergeSaleEdit, saleService, snapshotOf, validateSnapshot } from './sale.service';
import { isAdmin, requireAdmin } from '../lib/authz';
import {
  ForbiddenError,
  InvalidStateTransitionError,
  NotFoundError,
  StorageError,
  ValidationError,
} from '../lib/errors';
import { moduleLogger } from '../lib/logger';
import { parseCount, parseNum, toNullableTimestamp, toTimestamp } from '../lib/format';
import { requireId } from '../lib/validation';
import { DEFAULT_RECENT_LIMIT } from '../../shared/constants';
import type {
  Actor,
  ChangeRequest,
  ChangeRequestCounts,
  ChangeRequestDetail,
  ChangeRequestStatus,
  FieldChange,
  SaleEdit,
  SaleSnapshot,
} from '../../shared/types';

const log = moduleLogger('change-requests');

// ─────────────────────────────────────────────────────────────
// Interfaces
// ─────────────────────────────────────────────────────────────

export interface SubmitChangeRequestInput {
  sale_id: number;
  requested: SaleEdit;
  /** What the requester was looking at. Read from the sale when omitted. */
  current?: SaleSnapshot;
  note?: string;
}

export interface ChangeRequestFilters {
  status?: ChangeRequestStatus;
  requested_by?: string;
  limit?: number;
}

interface ChangeRequestRow {
  id: number;
  sale_id: number;
  change_type: string;
  requested_by: string;
  requester_name: string;
  current_data: unknown;
  requested_data: unknown;
  status: ChangeRequestStatus;
  note: string | null;
  reviewed_by: string | null;
  reviewed_at: unknown;
  admin_comment: string | null;
  created_at: unknown;
}

// ─────────────────────────────────────────────────────────────
// Snapshot (de)serialization
// ─────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseSnapshot(raw: unknown): SaleSnapshot {
  const data: unknown = typeof raw === 'string' ? JSON.parse(raw) : raw;
  if (!isRecord(data)) {
    throw new Error('Malformed sale snapshot in change request');
  }
  return {
    transaction_date: String(data.transaction_date ?? ''),
    fruit: String(data.fruit ?? ''),
    boxes: parseNum(data.boxes),
    price_per_box: parseNum(data.price_per_box),
    box_deposit_per_box: parseNum(data.box_deposit_per_box),
    note: String(data.note ?? ''),
  };
}

// ─────────────────────────────────────────────────────────────
// Service
// ─────────────────────────────────────────────────────────────

class ChangeRequestService extends BaseService<ChangeRequestRow, ChangeRequest> {
  constructor() {
    super('change_requests');
  }

  protected toEntity(row: ChangeRequestRow): ChangeRequest {
    return {
      id: row.id,
      sale_id: row.sale_id,
      change_type: 'edit_sale',
      requested_by: row.requested_by,
      requester_name: row.requester_name,
      current_data: parseSnapshot(row.current_data),
      requested_data: parseSnapshot(row.requested_data),
      status: row.status,
      note: row.note ?? '',
      reviewed_by: row.reviewed_by ?? null,
      reviewed_at: toNullableTimestamp(row.reviewed_at),
      admin_comment: row.admin_comment ?? null,
      created_at: toTimestamp(row.created_at),
    };
  }

  /**
   * Propose an edit to a sale. Both snapshots are stored as they are now;
   * approval later applies the requested one without re-reading the sale.
   */
  async submit(input: SubmitChangeRequestInput, requester: Actor): Promise<ChangeRequest> {
    const saleId = requireId(input.sale_id, 'sale_id');

    const request = await this.inTransaction('submit change request', async (trx) => {
      const sale = await saleService.getById(saleId, trx);
      if (!sale) throw new NotFoundError('Sale', saleId);

      const current = input.current ? validateSnapshot(input.current) : snapshotOf(sale);
      const requested = mergeSaleEdit(current, input.requested);
      if (changedFields(current, requested).length === 0) {
        throw new ValidationError('The requested values match the current sale; nothing to change');
      }

      return this.insertRow(trx, {
        sale_id: saleId,
        change_type: 'edit_sale',
        requested_by: requester.userId,
        requester_name: requester.displayName,
        current_data: JSON.stringify(current),
        requested_data: JSON.stringify(requested),
        status: 'pending',
        note: (input.note ?? '').trim(),
      });
    });

    log.info(
      {
        requestId: request.id,
        saleId,
        requestedBy: requester.userId,
        fields: changedFields(request.current_data, request.requested_data),
      },
      'Change request submitted'
    );
    return request;
  }

  /**
   * Apply a pending request to its sale and close it as approved.
   * total_price and box_deposit_collected are recomputed from the
   * requested boxes, price and deposit.
   */
  async approve(requestId: number, reviewer: Actor, comment?: string): Promise<ChangeRequest> {
    requireAdmin(reviewer, 'approve change requests');
    requireId(requestId, 'request_id');

    try {
      const approved = await this.inTransaction('approve change request', async (trx) => {
        const request = await this.lockPending(trx, requestId);
        await saleService.applySnapshot(trx, request.sale_id, request.requested_data);
        return this.closeRequest(trx, requestId, 'approved', reviewer, comment?.trim() || 'Approved');
      });

      log.info(
        { requestId, saleId: approved.sale_id, reviewedBy: reviewer.userId },
        'Change request approved and applied'
      );
      return approved;
    } catch (error) {
      this.warnOnStateConflict(error, requestId, 'approve');
      throw error;
    }
  }

  /** Close a pending request as rejected. The sale is never touched. */
  async reject(requestId: number, reviewer: Actor, reason: string): Promise<ChangeRequest> {
    requireAdmin(reviewer, 'reject change requests');
    requireId(requestId, 'request_id');
    const comment = (reason ?? '').trim();
    if (!comment) {
      throw new ValidationError('Rejection reason required');
    }

    try {
      const rejected = await this.inTransaction('reject change request', async (trx) => {
        await this.lockPending(trx, requestId);
        return this.closeRequest(trx, requestId, 'rejected', reviewer, comment);
      });

      log.info({ requestId, reviewedBy: reviewer.userId }, 'Change request rejected');
      return rejected;
    } catch (error) {
      this.warnOnStateConflict(error, requestId, 'reject');
      throw error;
    }
  }

  // ──────── Queue reads ────────

  /** With a viewer, regular users may only open their own requests. */
  async getRequest(id: number, viewer?: Actor): Promise<ChangeRequestDetail> {
    requireId(id, 'request_id');

    return this.read('get change request', async (db) => {
      const request = await this.getById(id, db);
      if (!request) throw new NotFoundError('Change request', id);
      if (viewer && !isAdmin(viewer) && request.requested_by !== viewer.userId) {
        throw new ForbiddenError('You can only view your own change requests');
      }

      const changes: FieldChange[] = changedFields(request.current_data, request.requested_data).map((field) => ({
        field,
        current: request.current_data[field],
        requested: request.requested_data[field],
      }));

      // Informational only: approval does not block on it
      let stale = false;
      if (request.status === 'pending') {
        const sale = await saleService.getById(request.sale_id, db);
        stale = !sale || changedFields(request.current_data, snapshotOf(sale)).length > 0;
      }

      return { ...request, changes, stale };
    });
  }

  /** Newest first. */
  async listRequests(filters: ChangeRequestFilters = {}): Promise<ChangeRequest[]> {
    const limit = filters.limit ?? DEFAULT_RECENT_LIMIT;

    return this.read('list change requests', async (db) => {
      let query = db('change_requests');
      if (filters.status) query = query.where('status', filters.status);
      if (filters.requested_by) query = query.where('requested_by', filters.requested_by);

      const rows: ChangeRequestRow[] = await query.select('*').orderBy('id', 'desc').limit(limit);
      return rows.map((row) => this.toEntity(row));
    });
  }

  async countByStatus(db?: Knex): Promise<ChangeRequestCounts> {
    const run = async (conn: Knex) => {
      const rows: { status: string; total: unknown }[] = await conn('change_requests')
        .select('status')
        .count({ total: '*' })
        .groupBy('status');

      const counts: ChangeRequestCounts = { pending: 0, approved: 0, rejected: 0 };
      for (const row of rows) {
        if (row.status === 'pending' || row.status === 'approved' || row.status === 'rejected') {
          counts[row.status] = parseCount(row.total);
        }
      }
      return counts;
    };
    return db ? run(db) : this.read('count change requests', run);
  }

  // ──────── Internals ────────

  private async lockPending(trx: Knex.Transaction, requestId: number): Promise<ChangeRequest> {
    const row: ChangeRequestRow | undefined = await trx('change_requests')
      .where({ id: requestId })
      .forUpdate()
      .first();
    if (!row) throw new NotFoundError('Change request', requestId);
    if (row.status !== 'pending') {
      throw new InvalidStateTransitionError(requestId, row.status);
    }
    return this.toEntity(row);
  }

  private async closeRequest(
    trx: Knex.Transaction,
    requestId: number,
    status: Exclude<ChangeRequestStatus, 'pending'>,
    reviewer: Actor,
    comment: string
  ): Promise<ChangeRequest> {
    const [row]: ChangeRequestRow[] = await trx('change_requests')
      .where({ id: requestId, status: 'pending' })
      .update({
        status,
        reviewed_by: reviewer.userId,
        reviewed_at: new Date().toISOString(),
        admin_comment: comment,
      })
      .returning('*');

    if (!row) throw new Error(`Change request ${requestId} changed during review`);
    return this.toEntity(row);
  }

  private warnOnStateConflict(error: unknown, requestId: number, action: string): void {
    if (error instanceof InvalidStateTransitionError) {
      log.warn({ requestId, status: error.currentStatus }, `Cannot ${action}: request already closed`);
    } else if (error instanceof StorageError) {
      log.error({ err: error, requestId }, `Failed to ${action} change request`);
    }
  }
}

export const changeRequestService = new ChangeRequestService();
