import { describe, it, expect, beforeEach } from 'vitest';
import { createTestContext, TestContext } from './helpers/fixtures';
import { ErrorCode, isAppError } from '../src/types/error.types';
import { RequestStatus, RequestType, ReviewDecision, ReviewOutcome } from '../src/types/request.types';

/**
 * Race Condition Tests
 *
 * Concurrent operations on the same request or item. Each state change is a
 * conditional update, so only one of the racing calls may take effect.
 *
 * Scenarios:
 * 1. Many reviewers approving one add request
 * 2. Approve vs deny on one request
 * 3. Two approved remove requests for the same item
 */

const fulfilled = <T>(results: PromiseSettledResult<T>[]): T[] =>
  results.flatMap((result) => (result.status === 'fulfilled' ? [result.value] : []));

const rejectionCodes = (results: PromiseSettledResult<unknown>[]): string[] =>
  results.flatMap((result) =>
    result.status === 'rejected' ? [isAppError(result.reason) ? result.reason.code : 'UNKNOWN'] : []
  );

describe('race conditions', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext();
  });

  it('applies one of many concurrent approvals and creates one item', async () => {
    const request = await ctx.container.requestService.submitRequest(ctx.admin, {
      requestType: RequestType.ADD_ITEM,
      itemName: 'Generator',
      description: 'Backup power',
    });

    const results = await Promise.allSettled(
      Array.from({ length: 10 }, () =>
        ctx.container.requestService.reviewRequest(ctx.quartermaster, request.id, {
          decision: ReviewDecision.APPROVE,
        })
      )
    );

    expect(fulfilled(results)).toHaveLength(1);
    expect(rejectionCodes(results)).toEqual(Array(9).fill(ErrorCode.ALREADY_REVIEWED));
    expect(await ctx.container.itemService.listItems(ctx.member)).toHaveLength(1);
  });

  it('keeps whichever of approve and deny lands first', async () => {
    const request = await ctx.container.requestService.submitRequest(ctx.admin, {
      requestType: RequestType.ADD_ITEM,
      itemName: 'Generator',
      description: 'Backup power',
    });

    const results = await Promise.allSettled([
      ctx.container.requestService.reviewRequest(ctx.quartermaster, request.id, {
        decision: ReviewDecision.APPROVE,
      }),
      ctx.container.requestService.reviewRequest(ctx.quartermaster, request.id, {
        decision: ReviewDecision.DENY,
        denialReason: 'Not in budget',
      }),
    ]);

    const [winner] = fulfilled(results);
    expect(rejectionCodes(results)).toEqual([ErrorCode.ALREADY_REVIEWED]);

    const stored = await ctx.container.requestService.getRequest(ctx.quartermaster, request.id);
    expect(stored.status).toBe(winner?.request.status);

    const created = await ctx.container.itemService.listItems(ctx.member);
    expect(created).toHaveLength(stored.status === RequestStatus.APPROVED ? 1 : 0);
  });

  it('removes an item once when two remove requests are approved together', async () => {
    const item = await ctx.container.itemService.createItem(ctx.quartermaster, { name: 'Old radio' });
    const submit = () =>
      ctx.container.requestService.submitRequest(ctx.admin, {
        requestType: RequestType.REMOVE_ITEM,
        itemId: item.id,
        description: 'Obsolete',
      });
    const first = await submit();
    const second = await submit();

    const outcomes: ReviewOutcome[] = await Promise.all(
      [first, second].map((request) =>
        ctx.container.requestService.reviewRequest(ctx.quartermaster, request.id, {
          decision: ReviewDecision.APPROVE,
        })
      )
    );

    expect(outcomes.map((outcome) => outcome.request.status)).toEqual([
      RequestStatus.APPROVED,
      RequestStatus.APPROVED,
    ]);
    expect(outcomes.map((outcome) => outcome.sideEffect.kind).sort()).toEqual([
      'item_removed',
      'target_already_absent',
    ]);
  });
});
