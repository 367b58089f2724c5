/**
 * @fileoverview Dependency Resolver
 *
 * Orders plugins so that dependencies come before dependents, and works out
 * which plugins cannot load: members of a dependency cycle, plugins that
 * reference a missing or disabled plugin, and everything that depends on
 * one of those, however indirectly.
 *
 * @module @mapcore/engine/engine/DependencyResolver
 */

import { DependencyError } from "../contracts/Errors.js";

/**
 * Minimal view of a plugin for resolution.
 */
export interface DependencyNode {
    readonly id: string;
    readonly dependencies: readonly string[];
}

export interface ResolveOptions {
    /** Ids that exist but are disabled; depending on them fails */
    readonly disabled?: ReadonlySet<string>;
}

export interface DependencyResolution {
    /** Resolvable ids, dependencies first; ties keep input order */
    readonly order: readonly string[];

    /** Unresolvable ids and why */
    readonly failures: ReadonlyMap<string, DependencyError>;
}

/**
 * Resolve a set of plugins.
 *
 * @example
 * ```typescript
 * const { order, failures } = resolveDependencies([
 *     { id: "a", dependencies: [] },
 *     { id: "b", dependencies: ["a"] },
 *     { id: "c", dependencies: ["missing"] },
 * ]);
 * // order: ["a", "b"]; failures: c
 * ```
 */
export function resolveDependencies(
    nodes: readonly DependencyNode[],
    options: ResolveOptions = {}
): DependencyResolution {
    const byId = new Map<string, DependencyNode>();
    for (const node of nodes) {
        if (!byId.has(node.id)) {
            byId.set(node.id, node);
        }
    }
    const disabled = options.disabled ?? new Set<string>();
    const failures = new Map<string, DependencyError>();

    for (const cycle of findCycles(nodes, byId)) {
        const path = [...cycle, cycle[0]].join(" -> ");
        for (const member of cycle) {
            failures.set(member, new DependencyError(
                member,
                cycle,
                `Plugin ${member} is part of a circular dependency: ${path}`
            ));
        }
    }

    // Failures spread to dependents until nothing changes
    let changed = true;
    while (changed) {
        changed = false;
        for (const node of nodes) {
            if (failures.has(node.id) || disabled.has(node.id)) {
                continue;
            }
            const unmet = node.dependencies.filter(
                dep => !byId.has(dep) || disabled.has(dep) || failures.has(dep)
            );
            if (unmet.length > 0) {
                failures.set(node.id, new DependencyError(
                    node.id,
                    unmet,
                    `Plugin ${node.id} has unmet dependencies: ${unmet.map(dep => describeUnmet(dep, byId, disabled)).join(", ")}`
                ));
                changed = true;
            }
        }
    }

    const order: string[] = [];
    const placed = new Set<string>();
    const place = (id: string): void => {
        if (placed.has(id)) {
            return;
        }
        placed.add(id);
        for (const dep of byId.get(id)?.dependencies ?? []) {
            place(dep);
        }
        order.push(id);
    };
    for (const node of nodes) {
        if (!failures.has(node.id) && !disabled.has(node.id)) {
            place(node.id);
        }
    }

    return { order, failures };
}

/**
 * Transitive dependencies of `id` in start order, ending with `id` itself.
 * Unknown ids are skipped; cycles are cut where they close.
 */
export function dependencyClosure(id: string, nodes: readonly DependencyNode[]): string[] {
    const byId = new Map(nodes.map(node => [node.id, node]));
    const order: string[] = [];
    const seen = new Set<string>();

    const visit = (current: string): void => {
        if (seen.has(current)) {
            return;
        }
        seen.add(current);
        const node = byId.get(current);
        if (!node) {
            return;
        }
        for (const dep of node.dependencies) {
            visit(dep);
        }
        order.push(current);
    };

    visit(id);
    return order;
}

/**
 * Ids of every plugin that depends on `id`, directly or transitively.
 */
export function dependentsOf(id: string, nodes: readonly DependencyNode[]): Set<string> {
    const result = new Set<string>();
    let frontier = [id];

    while (frontier.length > 0) {
        const next: string[] = [];
        for (const node of nodes) {
            if (result.has(node.id) || node.id === id) {
                continue;
            }
            if (node.dependencies.some(dep => frontier.includes(dep))) {
                result.add(node.id);
                next.push(node.id);
            }
        }
        frontier = next;
    }

    return result;
}

function describeUnmet(
    dep: string,
    byId: ReadonlyMap<string, DependencyNode>,
    disabled: ReadonlySet<string>
): string {
    if (!byId.has(dep)) {
        return disabled.has(dep) ? `${dep} (disabled)` : `${dep} (missing)`;
    }
    return disabled.has(dep) ? `${dep} (disabled)` : `${dep} (failed)`;
}

/**
 * Strongly connected components that form cycles (more than one member,
 * or a member depending on itself), found with Tarjan's algorithm.
 * Members are listed in dependency-walk order.
 */
function findCycles(
    nodes: readonly DependencyNode[],
    byId: ReadonlyMap<string, DependencyNode>
): string[][] {
    const index = new Map<string, number>();
    const lowLink = new Map<string, number>();
    const onStack = new Set<string>();
    const stack: string[] = [];
    const cycles: string[][] = [];
    let counter = 0;

    const lowOf = (id: string): number => lowLink.get(id) ?? Number.POSITIVE_INFINITY;

    const connect = (id: string): void => {
        index.set(id, counter);
        lowLink.set(id, counter);
        counter += 1;
        stack.push(id);
        onStack.add(id);

        for (const dep of byId.get(id)?.dependencies ?? []) {
            if (!byId.has(dep)) {
                continue;
            }
            const depIndex = index.get(dep);
            if (depIndex === undefined) {
                connect(dep);
                lowLink.set(id, Math.min(lowOf(id), lowOf(dep)));
            }
            else if (onStack.has(dep)) {
                lowLink.set(id, Math.min(lowOf(id), depIndex));
            }
        }

        if (lowOf(id) === index.get(id)) {
            const component: string[] = [];
            let member: string | undefined;
            do {
                member = stack.pop();
                if (member === undefined) {
                    break;
                }
                onStack.delete(member);
                component.push(member);
            } while (member !== id);

            const selfLoop = byId.get(id)?.dependencies.includes(id) ?? false;
            if (component.length > 1 || selfLoop) {
                cycles.push(component.reverse());
            }
        }
    };

    for (const node of nodes) {
        if (!index.has(node.id)) {
            connect(node.id);
        }
    }

    return cycles;
}
