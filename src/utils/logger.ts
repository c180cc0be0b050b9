import winston from 'winston';
import chalk from 'chalk';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { AgentKind, ChainStageId } from '../types';

const AGENT_COLORS: Record<AgentKind, (text: string) => string> = {
  [AgentKind.FRONTEND]: chalk.yellow,
  [AgentKind.BACKEND]: chalk.green,
  [AgentKind.SECURITY]: chalk.redBright,
  [AgentKind.PERFORMANCE]: chalk.magenta,
  [AgentKind.ARCHITECT]: chalk.cyan,
  [AgentKind.ANALYZER]: chalk.blueBright,
  [AgentKind.SCRIBE]: chalk.white,
};

const STAGE_ICONS: Record<ChainStageId, string> = {
  [ChainStageId.IDEA_DEFINITION]: '💡',
  [ChainStageId.PRD]: '📋',
  [ChainStageId.TRD]: '🏗️',
  [ChainStageId.FEATURE_BREAKDOWN]: '📝',
  [ChainStageId.USER_STORY]: '👤',
};

function isAgentKind(value: unknown): value is AgentKind {
  return Object.values(AgentKind).some((k) => k === value);
}

function isStageId(value: unknown): value is ChainStageId {
  return Object.values(ChainStageId).some((s) => s === value);
}

const customFormat = winston.format.printf(({ level, message, timestamp, agent, stage, gate }) => {
  const ts = chalk.gray(`[${timestamp}]`);
  const agentTag = isAgentKind(agent) ? AGENT_COLORS[agent](`[${agent}]`) : '';
  const stageTag = isStageId(stage) ? `${STAGE_ICONS[stage]} ` : '';
  const gateTag = typeof gate === 'string' ? chalk.gray(`<${gate}> `) : '';
  return `${ts} ${level} ${stageTag}${agentTag}${gateTag}${message}`;
});

const logger = winston.createLogger({
  level: process.env.PCO_LOG_LEVEL ?? 'info',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.colorize(),
    customFormat,
  ),
  transports: [
    new winston.transports.Console(),
  ],
});

export function addFileTransport(projectPath: string): void {
  const logDir = path.join(projectPath, '.pco', 'logs');
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'pco-error.log'),
      level: 'error',
      maxsize: 5 * 1024 * 1024,
      maxFiles: 3,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json(),
      ),
    }),
  );
  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'pco-combined.log'),
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json(),
      ),
    }),
  );
}

/** Sends console output to stderr, leaving stdout to a protocol transport. */
export function useStderrConsole(): void {
  const consoles = logger.transports.filter((t) => t instanceof winston.transports.Console);
  for (const transport of consoles) {
    logger.remove(transport);
  }
  logger.add(new winston.transports.Console({
    stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
  }));
}

export function setLogLevel(level: string): void {
  logger.level = level;
}

export function agentLog(
  kind: AgentKind,
  message: string,
  stage?: ChainStageId,
  level: string = 'info',
): void {
  logger.log({ level, message, agent: kind, stage, operation: 'agent' });
}

export function stageLog(
  stage: ChainStageId,
  message: string,
  level: string = 'info',
): void {
  logger.log({ level, message, stage, operation: 'stage' });
}

export function gateLog(
  gateId: string,
  message: string,
  stage?: ChainStageId,
  level: string = 'info',
): void {
  logger.log({ level, message, gate: gateId, stage, operation: 'gate' });
}

export function serverLog(serverId: string, message: string, level: string = 'info'): void {
  logger.log({ level, message: `[mcp:${serverId}] ${message}`, operation: 'mcp' });
}

export function chainLog(message: string, level: string = 'info'): void {
  logger.log({ level, message: chalk.bold(message), operation: 'chain' });
}

export default logger;
