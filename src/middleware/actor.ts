import type { Request } from 'express';
import { BadRequestError } from '../utils/errors';
import { MAX_INT } from '../utils/validation';

const ADMIN_ID_HEADER = 'x-admin-id';

/**
 * Id of the acting administrator, recorded in created_by/updated_by.
 * Authentication happens upstream; an absent header means an anonymous
 * system change.
 */
export function getAdminId(req: Request): number | null {
  const header = req.header(ADMIN_ID_HEADER);
  if (header === undefined || header.trim() === '') {
    return null;
  }
  const adminId = /^\d+$/.test(header.trim()) ? parseInt(header.trim(), 10) : 0;
  if (adminId < 1 || adminId > MAX_INT) {
    throw new BadRequestError(`${ADMIN_ID_HEADER} header must be a positive integer`);
  }
  return adminId;
}
