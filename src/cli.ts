#!/usr/bin/env node
/**
 * Research Assistant CLI
 *
 * Interactive chat, one-shot questions and direct tool calls against the
 * assistant built from environment configuration.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as readline from 'readline';
import type { Attachment } from './agent/conversation.js';
import type { LoopResult } from './agent/loop.js';
import { createAssistant, type Assistant } from './bootstrap.js';
import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { getAvailableProviders, getDefaultModelId } from './llm/provider.js';
import { describeSteps, loadAttachments, parseReplInput, renderPayload } from './repl.js';

interface OutputOptions {
  verbose?: boolean;
}

/**
 * Build the assistant. NDJSON logs reach stderr only in verbose mode; the
 * Log Sink keeps them either way.
 */
function startAssistant(options: OutputOptions): Assistant {
  return createAssistant(loadConfig(), options.verbose ? {} : { logOutput: () => {} });
}

function printResult(result: LoopResult, verbose: boolean): void {
  if (verbose) {
    for (const line of describeSteps(result.steps)) {
      console.log(chalk.magenta(line));
    }
  }

  const color = result.status === 'done' ? chalk.green : chalk.yellow;
  console.log(color(`\nAssistant: ${result.text}\n`));

  if (verbose && result.usage) {
    console.log(
      chalk.gray(
        `Tokens: ${result.usage.totalTokens} (prompt: ${result.usage.promptTokens}, completion: ${result.usage.completionTokens})`
      )
    );
  }
  if (result.status === 'failed' && result.error) {
    console.error(chalk.red(`Run failed: ${result.error}`));
  }
}

function printTools(assistant: Assistant, verbose: boolean): void {
  console.log(chalk.green(`\nFound ${assistant.registry.size} tools:\n`));
  for (const tool of assistant.registry.describeTools()) {
    console.log(chalk.white(tool.name));
    console.log(chalk.gray(`  ${tool.description}`));
    if (verbose && tool.inputSchema.properties) {
      console.log(chalk.gray(`  Parameters: ${JSON.stringify(tool.inputSchema.properties, null, 2)}`));
    }
    console.log();
  }
}

// =============================================================================
// Commands
// =============================================================================

async function runChatMode(options: OutputOptions & { file?: string[] }): Promise<void> {
  const verbose = options.verbose ?? false;
  const assistant = startAssistant(options);
  const session = assistant.createSession('chat');
  let pending: Attachment[] = await loadAttachments(options.file ?? []);

  console.log(chalk.blue(`Model: ${assistant.config.model ?? getDefaultModelId(assistant.config.provider)}`));
  console.log(chalk.green(`Available tools: ${assistant.registry.names().join(', ')}`));
  console.log(chalk.yellow('\nChat mode started. Type your messages, or:'));
  console.log(chalk.gray('  /attach <path...>  - Attach files to the next message'));
  console.log(chalk.gray('  /logs [level]      - Show recent log records'));
  console.log(chalk.gray('  /tools             - List available tools'));
  console.log(chalk.gray('  /clear             - Clear conversation history'));
  console.log(chalk.gray('  /quit              - Exit'));
  console.log();

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt(chalk.cyan('You: '));
  rl.prompt();

  for await (const line of rl) {
    const input = parseReplInput(line);

    if (input.kind === 'quit') {
      console.log(chalk.yellow('Goodbye!'));
      break;
    }

    switch (input.kind) {
      case 'empty':
        break;
      case 'invalid':
        console.log(chalk.red(input.error));
        break;
      case 'clear':
        session.clearHistory();
        pending = [];
        console.log(chalk.yellow('Conversation history cleared.'));
        break;
      case 'tools':
        printTools(assistant, verbose);
        break;
      case 'logs': {
        const text = assistant.sink.format(input.level);
        console.log(text ? chalk.gray(text) : chalk.gray('(no log records)'));
        break;
      }
      case 'attach':
        try {
          const loaded = await loadAttachments(input.paths);
          pending.push(...loaded);
          console.log(chalk.blue(`Attached: ${loaded.map((a) => a.name).join(', ')}`));
        } catch (error) {
          console.error(chalk.red(`Could not attach: ${errorMessage(error)}`));
        }
        break;
      case 'message':
        try {
          console.log(chalk.gray('Thinking...'));
          const result = await session.chat(input.text, pending);
          pending = [];
          printResult(result, verbose);
        } catch (error) {
          console.error(chalk.red(`Error: ${errorMessage(error)}`));
        }
        break;
    }

    rl.prompt();
  }

  rl.close();
}

async function askOnce(prompt: string, options: OutputOptions & { file?: string[] }): Promise<void> {
  const assistant = startAssistant(options);
  const attachments = await loadAttachments(options.file ?? []);
  const result = await assistant.createSession('ask').chat(prompt, attachments);
  printResult(result, options.verbose ?? false);
  if (result.status === 'failed') {
    process.exitCode = 1;
  }
}

async function callTool(toolName: string, argsJson: string | undefined, options: OutputOptions): Promise<void> {
  const assistant = startAssistant(options);
  const args: unknown = argsJson ? JSON.parse(argsJson) : {};
  console.log(chalk.blue(`Calling tool: ${toolName}`));
  if (options.verbose) {
    console.log(chalk.gray(`Arguments: ${JSON.stringify(args, null, 2)}`));
  }

  const payload = await assistant.registry.dispatch(toolName, args);
  console.log(chalk.green('Result:'));
  console.log(renderPayload(payload));
}

function showInfo(): void {
  const config = loadConfig();
  const providers = getAvailableProviders();

  console.log(chalk.blue('\nResearch Assistant Information\n'));

  console.log(chalk.white('Configuration:'));
  console.log(chalk.gray(`  Provider:        ${config.provider}`));
  console.log(chalk.gray(`  Model:           ${config.model ?? getDefaultModelId(config.provider)}`));
  console.log(
    chalk.gray(`  Image model:     ${config.imageModel}${config.geminiApiKey ? '' : ' (disabled: GEMINI_API_KEY not set)'}`)
  );
  console.log(chalk.gray(`  Max iterations:  ${config.maxIterations}`));
  console.log(chalk.gray(`  Prompts:         ${config.promptsDir} (refresh: ${config.promptRefresh})`));
  console.log(chalk.gray(`  Infographics:    ${config.infographicsDir}`));

  console.log(chalk.white('\nAvailable Providers:'));
  console.log(chalk.green(`  google: ${providers.google ? 'Available (GEMINI_API_KEY set)' : 'Not available (set GEMINI_API_KEY)'}`));
  console.log(
    chalk.green(
      `  openrouter: ${providers.openrouter ? 'Available (OPENROUTER_API_KEY set)' : 'Not available (set OPENROUTER_API_KEY)'}`
    )
  );

  console.log(chalk.white('\nExamples:'));
  console.log(chalk.cyan('  research-assistant chat -f paper.pdf'));
  console.log(chalk.cyan('  research-assistant ask "Find recent papers on sparse attention"'));
  console.log(chalk.cyan('  research-assistant call retrieve_related_papers \'{"query":"graph neural networks"}\''));
  console.log();
}

// =============================================================================
// Program
// =============================================================================

const program = new Command();

program
  .name('research-assistant')
  .description('Research assistant that searches, explains and checks academic papers')
  .version('1.0.0');

program
  .command('chat')
  .description('Start an interactive chat')
  .option('-f, --file <path...>', 'Files to attach to the first message')
  .option('-v, --verbose', 'Show tool calls, token usage and log lines')
  .action(async (options: OutputOptions & { file?: string[] }) => {
    await runChatMode(options);
  });

program
  .command('ask <prompt>')
  .description('Ask a single question and print the answer')
  .option('-f, --file <path...>', 'Files to attach')
  .option('-v, --verbose', 'Show tool calls, token usage and log lines')
  .action(async (prompt: string, options: OutputOptions & { file?: string[] }) => {
    await askOnce(prompt, options);
  });

program
  .command('tools')
  .description('List the available tools')
  .option('-v, --verbose', 'Show parameter schemas')
  .action((options: OutputOptions) => {
    printTools(startAssistant({}), options.verbose ?? false);
  });

program
  .command('call <tool> [args]')
  .description('Call a specific tool with JSON arguments')
  .option('-v, --verbose', 'Show verbose output')
  .action(async (tool: string, args: string | undefined, options: OutputOptions) => {
    await callTool(tool, args, options);
  });

program
  .command('info')
  .description('Show configuration and provider availability')
  .action(() => {
    showInfo();
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  process.exit(1);
});
