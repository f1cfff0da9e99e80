import { YouTubeClient, createLogger, errorMessage, loadConfig } from '@tubepulse/shared';
import { createToolContext } from './context.js';
import { startStdioServer } from './server.js';
import { ALL_TOOLS, findTool } from './tools/index.js';

function printHelp() {
  console.log(`
tubepulse — YouTube analytics tools over MCP

Usage (from the repository root):
  npm start                                   Run the MCP server on stdio
  npm run cli -- serve                        Same as npm start
  npm run cli -- tools                        List available tools
  npm run cli -- call <tool> [json-args]      Run one tool and print its result

Examples:
  npm run cli -- call get_video_info '{"video_id":"https://youtu.be/abc123"}'
  npm run cli -- call compare_channels '{"channel_ids":["@first","@second"]}'

Environment:
  YOUTUBE_API_KEY        YouTube Data API v3 key (required for serve and call)
  YOUTUBE_API_BASE_URL   API base URL override
  LOG_LEVEL              trace | debug | info | warn | error | fatal | silent
  `);
}

function bootstrap() {
  const config = loadConfig();
  const logger = createLogger('tubepulse', config.logLevel);
  const catalog = new YouTubeClient({
    apiKey: config.youtubeApiKey,
    baseUrl: config.youtubeApiBaseUrl,
    logger,
  });
  return createToolContext(catalog, logger);
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === '--help' || command === '-h') {
    printHelp();
    process.exit(0);
  }

  // Dynamic imports for chalk/table (ESM)
  const chalk = (await import('chalk')).default;
  const Table = (await import('cli-table3')).default;

  switch (command) {
    case 'serve': {
      await startStdioServer(bootstrap());
      break;
    }

    case 'tools': {
      const table = new Table({
        head: [chalk.cyan('Tool'), chalk.cyan('Arguments'), chalk.cyan('Description')],
        colWidths: [30, 40, 60],
        wordWrap: true,
      });

      for (const tool of ALL_TOOLS) {
        const argNames = Object.entries(tool.inputSchema).map(([name, schema]) =>
          schema.isOptional() ? chalk.dim(`${name}?`) : name,
        );
        table.push([chalk.bold(tool.name), argNames.join(', '), tool.description]);
      }

      console.log(table.toString());
      console.log(chalk.dim(`  ${ALL_TOOLS.length} tools`));
      break;
    }

    case 'call': {
      const toolName = args[1];
      const tool = toolName ? findTool(toolName) : undefined;
      if (!tool) {
        console.error(chalk.red(`  ✗ Unknown tool: ${toolName ?? '(none)'}`));
        console.error(chalk.dim('    Run "npm run cli -- tools" for the list'));
        process.exit(1);
      }

      let toolArgs: unknown;
      try {
        toolArgs = JSON.parse(args[2] ?? '{}');
      } catch (err) {
        console.error(chalk.red(`  ✗ Arguments must be JSON: ${errorMessage(err)}`));
        process.exit(1);
      }

      const result = await tool.run(toolArgs, bootstrap());
      for (const item of result.content) {
        if (item.type === 'text') {
          console.log(result.isError ? chalk.red(item.text) : item.text);
        }
      }
      process.exitCode = result.isError ? 1 : 0;
      break;
    }

    default:
      console.error(chalk.red(`  ✗ Unknown command: ${command}`));
      printHelp();
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(`Fatal: ${errorMessage(err)}`);
  process.exit(1);
});
