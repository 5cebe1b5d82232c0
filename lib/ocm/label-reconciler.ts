/**
 * Label Reconciliation
 *
 * Converges the labels of OCM label owners to a desired state. Only owners
 * present in the current state are acted on: they are the ones known to
 * exist in OCM.
 */

import { diffMappings, sameMapping } from "../differ.js";
import { formatAction, logger as defaultLogger, type Logger } from "../logger.js";
import type { LabelStore } from "./labels.js";
import type { LabelOwnerRef, LabelState } from "./label-sources.js";

export type LabelOperation =
  | { type: "add"; owner: LabelOwnerRef; key: string; value: string }
  | { type: "delete"; owner: LabelOwnerRef; key: string; value: string }
  | { type: "update"; owner: LabelOwnerRef; key: string; value: string; previous: string };

/**
 * Operations turning `current` into `desired`, per owner: additions, then
 * deletions, then updates, each in key order.
 */
export function computeLabelOperations(
  current: LabelState,
  desired: LabelState,
  logger: Logger = defaultLogger
): LabelOperation[] {
  const operations: LabelOperation[] = [];

  for (const owner of desired.owners()) {
    if (!current.has(owner)) {
      logger.debug(formatAction("skip_missing_owner", ...owner.identityLabels()));
    }
  }

  for (const [owner, currentLabels] of current) {
    const desiredLabels = desired.get(owner) ?? {};
    if (sameMapping(currentLabels, desiredLabels)) {
      continue;
    }
    const diff = diffMappings(currentLabels, desiredLabels);
    for (const [key, value] of Object.entries(diff.add)) {
      operations.push({ type: "add", owner, key, value });
    }
    for (const [key, value] of Object.entries(diff.delete)) {
      operations.push({ type: "delete", owner, key, value });
    }
    for (const [key, { current: previous, desired: value }] of Object.entries(diff.change)) {
      operations.push({ type: "update", owner, key, value, previous });
    }
  }

  return operations;
}

function actionName(operation: LabelOperation, scope: string | undefined): string {
  const verb = operation.type === "add" ? "create" : operation.type;
  return scope ? `${verb}_${scope}_label` : `${verb}_label`;
}

async function applyOperation(store: LabelStore, operation: LabelOperation): Promise<void> {
  const href = operation.owner.requiredLabelContainerHref();
  switch (operation.type) {
    case "add":
      return store.addLabel(href, operation.key, operation.value);
    case "delete":
      return store.deleteLabel(href, operation.key);
    case "update":
      return store.updateLabel(href, operation.key, operation.value);
    default: {
      const unhandled: never = operation;
      throw new Error(`unhandled label operation: ${JSON.stringify(unhandled)}`);
    }
  }
}

export interface ReconcileLabelsOptions {
  current: LabelState;
  desired: LabelState;
  /** Label store per OCM environment name */
  stores: ReadonlyMap<string, LabelStore>;
  dryRun: boolean;
  /** Owner kind included in action names, e.g. `organization` */
  scope?: string;
  logger?: Logger;
}

/**
 * Log every operation and, outside dry-run, apply it to the owner's label
 * container. Returns the operations.
 */
export async function reconcileLabels(options: ReconcileLabelsOptions): Promise<LabelOperation[]> {
  const log = options.logger ?? defaultLogger;
  const operations = computeLabelOperations(options.current, options.desired, log);

  for (const operation of operations) {
    log.info(
      formatAction(actionName(operation, options.scope), ...operation.owner.identityLabels(), `${operation.key}=${operation.value}`)
    );
    if (options.dryRun) {
      continue;
    }
    const store = options.stores.get(operation.owner.ocmEnv);
    if (!store) {
      throw new Error(`no label store for OCM environment ${operation.owner.ocmEnv}`);
    }
    await applyOperation(store, operation);
  }

  return operations;
}
