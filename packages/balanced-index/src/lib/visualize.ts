import { IIndexNode, balanceFactor } from "./avl";

//
// Describes a single node.
//
function describeNode(node: IIndexNode): string {
    return `${node.key} (h=${node.height}, bf=${balanceFactor(node)})`;
}

/**
 * Visualize the tree in ASCII, left child before right child.
 * The missing child of a node with one child is shown as ∅.
 */
export function visualizeIndex(node: IIndexNode | undefined, prefix: string = '', isLast: boolean = true): string {
    if (!node) return '';
    
    let result = prefix + (isLast ? '└── ' : '├── ') + describeNode(node) + '\n';
    
    // Add children
    const newPrefix = prefix + (isLast ? '    ' : '│   ');
    
    if (node.left && node.right) {
        result += visualizeIndex(node.left, newPrefix, false);
        result += visualizeIndex(node.right, newPrefix, true);
    }
    else if (node.left) {
        result += visualizeIndex(node.left, newPrefix, false);
        result += newPrefix + '└── ∅\n';
    }
    else if (node.right) {
        result += newPrefix + '├── ∅\n';
        result += visualizeIndex(node.right, newPrefix, true);
    }
    
    return result;
}
