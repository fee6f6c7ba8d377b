//
// A node in the balanced index.
//
export interface IIndexNode {
    key: string; // The key that orders the node.
    value: string; // The payload stored against the key.
    height: number; // Height of the subtree rooted at this node. Set to 1 for leaf nodes.
    left?: IIndexNode; // Left child node, all keys are less than this node's key.
    right?: IIndexNode; // Right child node, all keys are greater than this node's key.
}

//
// Counts the rotations performed on an index.
//
export interface IRotationStats {
    rotations: number;
}

//
// Compare two keys for ordering.
// Returns negative if a < b, zero if equal, positive if a > b.
// Keys are compared case-sensitively by UTF-16 code unit.
//
export function compareKeys(a: string, b: string): number {
    if (a < b) {
        return -1;
    }
    if (a > b) {
        return 1;
    }
    return 0;
}

/**
 * Create a new leaf node for a key and value.
 */
export function createLeafNode(key: string, value: string): IIndexNode {
    return {
        key,
        value,
        height: 1,
    };
}

//
// Gets the height of a node, 0 for an absent node.
//
export function height(node: IIndexNode | undefined): number {
    return node ? node.height : 0;
}

//
// Gets the difference between the heights of the left and right subtrees, 0 for an absent node.
//
export function balanceFactor(node: IIndexNode | undefined): number {
    if (!node) {
        return 0;
    }
    return height(node.left) - height(node.right);
}

//
// Recomputes the height of a node from its children.
// Must be called after either child of the node changes.
//
export function updateHeight(node: IIndexNode): void {
    node.height = 1 + Math.max(height(node.left), height(node.right));
}

/**
 * Rotate right to balance the tree
 * 
 * The left child of the input node becomes the new root, and the original
 * node becomes the right child of the new root.
 * 
 * @param z - The node to rotate
 * @returns The new root of the subtree
 */
export function rotateRight(z: IIndexNode, stats: IRotationStats): IIndexNode {
    const y = z.left;
    if (!y) {
        throw new Error(`Cannot rotate right at "${z.key}", it has no left child.`);
    }

    z.left = y.right;
    y.right = z;

    // Child before parent, the parent's height depends on it.
    updateHeight(z);
    updateHeight(y);

    stats.rotations += 1;
    return y;
}

/**
 * Rotate left to balance the tree
 * 
 * The right child of the input node becomes the new root, and the original
 * node becomes the left child of the new root.
 * 
 * @param z - The node to rotate
 * @returns The new root of the subtree
 */
export function rotateLeft(z: IIndexNode, stats: IRotationStats): IIndexNode {
    const y = z.right;
    if (!y) {
        throw new Error(`Cannot rotate left at "${z.key}", it has no right child.`);
    }

    z.right = y.left;
    y.left = z;

    updateHeight(z);
    updateHeight(y);

    stats.rotations += 1;
    return y;
}

//
// Left-Right case: rotate the left child left, then rotate the node right.
//
export function rotateLeftRight(z: IIndexNode, stats: IRotationStats): IIndexNode {
    if (!z.left) {
        throw new Error(`Cannot rotate left-right at "${z.key}", it has no left child.`);
    }
    z.left = rotateLeft(z.left, stats);
    return rotateRight(z, stats);
}

//
// Right-Left case: rotate the right child right, then rotate the node left.
//
export function rotateRightLeft(z: IIndexNode, stats: IRotationStats): IIndexNode {
    if (!z.right) {
        throw new Error(`Cannot rotate right-left at "${z.key}", it has no right child.`);
    }
    z.right = rotateRight(z.right, stats);
    return rotateLeft(z, stats);
}

/**
 * Insert a key into the subtree and return the new root of the subtree.
 * 
 * An existing key has its value overwritten in place. Nothing else changes
 * in that case, so there is no height update and no rebalancing.
 */
export function insertNode(node: IIndexNode | undefined, key: string, value: string, stats: IRotationStats): IIndexNode {
    if (!node) {
        return createLeafNode(key, value);
    }

    const cmp = compareKeys(key, node.key);
    if (cmp < 0) {
        node.left = insertNode(node.left, key, value, stats);
    }
    else if (cmp > 0) {
        node.right = insertNode(node.right, key, value, stats);
    }
    else {
        node.value = value;
        return node;
    }

    updateHeight(node);

    const balance = balanceFactor(node);

    // The inserted key decides which grandchild grew.
    if (balance > 1 && node.left) {
        if (compareKeys(key, node.left.key) < 0) {
            return rotateRight(node, stats);
        }
        if (compareKeys(key, node.left.key) > 0) {
            return rotateLeftRight(node, stats);
        }
    }

    if (balance < -1 && node.right) {
        if (compareKeys(key, node.right.key) > 0) {
            return rotateLeft(node, stats);
        }
        if (compareKeys(key, node.right.key) < 0) {
            return rotateRightLeft(node, stats);
        }
    }

    return node;
}

//
// Finds the node with a key, undefined when the key is not in the subtree.
//
export function searchNode(node: IIndexNode | undefined, key: string): IIndexNode | undefined {
    if (!node) {
        return undefined;
    }

    const cmp = compareKeys(key, node.key);
    if (cmp === 0) {
        return node;
    }

    if (cmp < 0) {
        return searchNode(node.left, key);
    }
    return searchNode(node.right, key);
}

//
// Finds the leftmost node of a subtree.
//
export function findMin(node: IIndexNode): IIndexNode {
    let current = node;
    while (current.left) {
        current = current.left;
    }
    return current;
}

//
// Set by deleteNode when the key was found and removed.
//
export interface IRemoval {
    removed: boolean;
}

/**
 * Delete a key from the subtree and return the new root of the subtree.
 * Deleting a key that isn't there returns the subtree unchanged.
 * 
 * Unlike insertion, every ancestor on the way back up may need a rotation.
 */
export function deleteNode(node: IIndexNode | undefined, key: string, stats: IRotationStats, removal?: IRemoval): IIndexNode | undefined {
    if (!node) {
        return undefined;
    }

    const cmp = compareKeys(key, node.key);
    if (cmp < 0) {
        node.left = deleteNode(node.left, key, stats, removal);
    }
    else if (cmp > 0) {
        node.right = deleteNode(node.right, key, stats, removal);
    }
    else {
        if (removal) {
            removal.removed = true;
        }

        if (!node.left) {
            return node.right;
        }
        if (!node.right) {
            return node.left;
        }

        // Two children: take over the successor's entry, then remove the successor.
        const successor = findMin(node.right);
        node.key = successor.key;
        node.value = successor.value;
        node.right = deleteNode(node.right, successor.key, stats);
    }

    updateHeight(node);

    // The deleted key is gone, so the child's own balance decides between single and double rotations.
    const balance = balanceFactor(node);
    if (balance > 1) {
        if (balanceFactor(node.left) >= 0) {
            return rotateRight(node, stats);
        }
        return rotateLeftRight(node, stats);
    }

    if (balance < -1) {
        if (balanceFactor(node.right) <= 0) {
            return rotateLeft(node, stats);
        }
        return rotateRightLeft(node, stats);
    }

    return node;
}

//
// Counts the nodes in a subtree.
//
export function countNodes(node: IIndexNode | undefined): number {
    if (!node) {
        return 0;
    }
    return 1 + countNodes(node.left) + countNodes(node.right);
}
