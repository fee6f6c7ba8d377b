import { IIndexNode, balanceFactor, compareKeys, height } from "./avl";
import { iterateInOrder, traverseIndex } from "./traverse";

//
// Kinds of broken invariant.
//
export type InvariantKind = "order" | "duplicate" | "balance" | "height";

//
// An invariant that doesn't hold at a node.
//
export interface IInvariantViolation {
    kind: InvariantKind;
    key: string;
    message: string;
}

//
// Checks the invariants of the tree:
// keys strictly ascend in order, no node is more than one level out of balance,
// and every stored height matches the heights of the children.
// Returns an empty array when everything holds.
//
export function verifyIndex(root: IIndexNode | undefined): IInvariantViolation[] {
    const violations: IInvariantViolation[] = [];

    let previous: IIndexNode | undefined = undefined;
    for (const node of iterateInOrder(root)) {
        if (previous) {
            const cmp = compareKeys(previous.key, node.key);
            if (cmp === 0) {
                violations.push({
                    kind: "duplicate",
                    key: node.key,
                    message: `Key "${node.key}" appears more than once`,
                });
            }
            else if (cmp > 0) {
                violations.push({
                    kind: "order",
                    key: node.key,
                    message: `Key "${node.key}" comes after "${previous.key}" in order`,
                });
            }
        }
        previous = node;
    }

    traverseIndex(root, node => {
        const expectedHeight = 1 + Math.max(height(node.left), height(node.right));
        if (node.height !== expectedHeight) {
            violations.push({
                kind: "height",
                key: node.key,
                message: `Node "${node.key}" has height ${node.height}, expected ${expectedHeight}`,
            });
        }

        const balance = balanceFactor(node);
        if (Math.abs(balance) > 1) {
            violations.push({
                kind: "balance",
                key: node.key,
                message: `Node "${node.key}" has balance factor ${balance}`,
            });
        }

        return true;
    });

    return violations;
}
