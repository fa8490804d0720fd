/**
 * Transaction Grouper
 *
 * A method is transactional when its comment-stripped body starts, commits,
 * rolls back or checks a transaction. Every operation from such a method
 * shares one group id.
 */

import { createHash } from 'crypto';
import type { DatabaseOperation, TransactionGroup } from '../types.js';
import { TRANSACTION_PATTERN } from '../patterns.js';

export function isTransactional(body: string): boolean {
  return TRANSACTION_PATTERN.test(body);
}

/**
 * Deterministic group id: unit, class, method and the method's position among
 * the unit's transactional methods. Overloads of one method get distinct ids.
 */
export function transactionGroupId(
  unitName: string,
  containingClass: string,
  methodName: string,
  sequence: number
): string {
  return createHash('sha256')
    .update(`${unitName}\u0000${containingClass}\u0000${methodName}\u0000${sequence}`)
    .digest('hex')
    .slice(0, 8);
}

/**
 * Cluster operations by group id, in order of each group's first member.
 * Group metadata comes from that first member.
 */
export function groupByTransaction(operations: readonly DatabaseOperation[]): TransactionGroup[] {
  const groups = new Map<string, TransactionGroup>();

  for (const operation of operations) {
    const groupId = operation.transactionGroupId;
    if (!operation.isPartOfTransaction || !groupId) continue;

    const existing = groups.get(groupId);
    if (existing) {
      existing.operations.push(operation);
      continue;
    }
    groups.set(groupId, {
      groupId,
      methodName: operation.methodName,
      containingClass: operation.containingClass,
      operations: [operation],
      originalSourceText: operation.originalSourceText,
    });
  }

  return [...groups.values()];
}
