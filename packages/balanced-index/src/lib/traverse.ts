import { IIndexNode } from "./avl";

// 
// Iterates nodes in ascending key order (left, node, right).
//
export function* iterateInOrder(node: IIndexNode | undefined): Generator<IIndexNode> {
    if (!node) {
        return;
    }

    yield* iterateInOrder(node.left);
    yield node;
    yield* iterateInOrder(node.right);
}

// 
// Iterates nodes parent first (node, left, right).
//
export function* iteratePreOrder(node: IIndexNode | undefined): Generator<IIndexNode> {
    if (!node) {
        return;
    }

    yield node;
    yield* iteratePreOrder(node.left);
    yield* iteratePreOrder(node.right);
}

/**
 * Calls a callback for each node, parent first.
 * The callback can return false to skip the children of that node.
 */
export function traverseIndex(node: IIndexNode | undefined, callback: (node: IIndexNode) => boolean): void {
    if (!node) {
        return;
    }
    
    if (!callback(node)) {
        return;
    }
    
    traverseIndex(node.left, callback);
    traverseIndex(node.right, callback);
}
