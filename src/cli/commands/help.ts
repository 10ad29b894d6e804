import { readVersion } from '../../version.js';
import { bold, cyan, stdout } from '../ui.js';

export function showHelp(): number {
  stdout(`${bold(`Pathwise v${readVersion()}`)} ${cyan('Longest paths in directed acyclic graphs')}

${bold('Usage:')}
  pathwise <command> [options...]

${bold('Path Commands:')}
  ${cyan('longest')} [vertex-id] [options]  Longest path length from one vertex, or from every vertex
    -g, --graph FILE             JSON graph file: { "vertices"?: [ids], "edges": [[from, to], ...] }
                                 (default: built-in 7-vertex sample DAG)
    --json                       Print results as JSON on stdout
    --traversal MODE             recursive | iterative (default from config)
    --continue-on-cycle          Skip cyclic start vertices instead of stopping the run

${bold('MCP Server Commands:')}
  ${cyan('mcp start')}                    Start the MCP server (stdio) with the LongestPath tool

${bold('Configuration:')}
  ${cyan('config show')}                  Show current configuration (resolved values)
  ${cyan('config set')} <key> <value>     Set a config value (persisted to ~/.pathwise/config.json)
  ${cyan('config reset')} <key>           Remove a key from config file (revert to default)
  ${cyan('config path')}                  Print config file location

  ${cyan('help')}                         Show this help message

${bold('Examples:')}
  pathwise longest                                 # Every vertex of the sample DAG
  pathwise longest 1                               # Sample DAG, start at vertex 1
  pathwise longest 3 --graph graph.json --json
  pathwise config set traversal recursive`);
  return 0;
}
