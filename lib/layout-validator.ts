import type { ValidationReport } from "../shared/types";
import {
  MIN_SIZE_MIN,
  RATIO_MAX,
  RATIO_MIN,
  countNodes,
  parentOf,
  treeDepth,
  type DockNode,
} from "./layout";

export const MAX_RECOMMENDED_DEPTH = 10;
export const MAX_RECOMMENDED_NODES = 50;

/**
 * Structural sanity check, run on demand. Errors make the layout unsafe to
 * persist or restore; warnings are advisory.
 */
export function validateLayout(root: DockNode | null): ValidationReport {
  const report: ValidationReport = { isValid: true, errors: [], warnings: [] };
  const addError = (message: string) => {
    report.isValid = false;
    report.errors.push(message);
  };

  if (!root) {
    addError("Root node is null");
    return report;
  }
  if (parentOf(root) !== null) {
    addError(`Root node ${root.id} is still attached to a parent`);
  }

  const seen = new Set<string>();

  const visit = (node: DockNode) => {
    if (node.id === "") {
      addError("Node has empty ID");
    } else if (seen.has(node.id)) {
      addError(`Duplicate node id: ${node.id}`);
    }
    seen.add(node.id);

    if (node.minSize < MIN_SIZE_MIN) {
      report.warnings.push(`Node ${node.id} has very small minSize: ${node.minSize}`);
    }

    switch (node.kind) {
      case "panel":
        if (node.title === "") report.warnings.push(`Panel ${node.id} has empty title`);
        if (node.contentRef === "") report.warnings.push(`Panel ${node.id} has empty content reference`);
        break;
      case "split": {
        if (node.ratio < RATIO_MIN || node.ratio > RATIO_MAX) {
          report.warnings.push(`Invalid split ratio in node ${node.id}: ${node.ratio}`);
        }
        const { first, second } = node;
        if (!first || !second) {
          addError(`Split ${node.id} missing child nodes`);
          return;
        }
        for (const child of [first, second]) {
          if (parentOf(child) !== node) {
            addError(`Node ${child.id} has inconsistent parent link`);
          }
          visit(child);
        }
        break;
      }
      default:
        addError("Node has unknown kind");
    }
  };

  visit(root);

  const depth = treeDepth(root);
  if (depth > MAX_RECOMMENDED_DEPTH) {
    report.warnings.push(`Layout depth is very deep: ${depth} levels (recommended < ${MAX_RECOMMENDED_DEPTH})`);
  }
  const nodeCount = countNodes(root);
  if (nodeCount > MAX_RECOMMENDED_NODES) {
    report.warnings.push(`Too many nodes: ${nodeCount} (recommended < ${MAX_RECOMMENDED_NODES})`);
  }

  return report;
}
