/**
 * Graph Analysis
 *
 * - DependencyResolver: adjacency and reference checks
 * - CycleDetector: reject circular successor relations
 * - TopologicalSorter: phases for `explain`
 * - GraphBuilder: ties them together into an ExecutionGraph
 */

export * from './ExecutionGraph.js';
export * from './DependencyResolver.js';
export * from './CycleDetector.js';
export * from './TopologicalSorter.js';
export * from './GraphBuilder.js';
