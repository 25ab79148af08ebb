/**
 * Stage Message Emitter
 *
 * Resolves user-facing message templates (`message`, retry and breaker
 * messages) and publishes them as log lines and STAGE_MESSAGE events.
 * Empty results are dropped.
 *
 * @module execution
 */

import { createEvent, EngineEventType } from '../events/EngineEvents.js';
import { ExecutionLogFormatter } from '../logging/ExecutionLogFormatter.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import { LogCategory, LogLevel } from '../types/log-types.js';
import type { EventBus } from '../events/EventBus.js';
import type { ExecutionContext } from '../context/ExecutionContext.js';
import type { TemplateResolver, TemplateResponse } from '../context/TemplateResolver.js';

export interface MessageTarget {
  workflowName: string;
  stageName: string;
  execution: ExecutionContext;
  response?: TemplateResponse;
}

export class StageMessageEmitter {
  constructor(
    private readonly templateResolver: TemplateResolver,
    private readonly events: EventBus,
  ) {}

  /**
   * @returns The resolved message, or undefined when nothing was emitted
   */
  async emit(template: string | undefined, target: MessageTarget, level: LogLevel = LogLevel.INFO): Promise<string | undefined> {
    if (!template || !template.trim()) {
      return undefined;
    }

    const message = this.templateResolver.resolve(template, target.execution, target.response);
    if (!message.trim()) {
      return undefined;
    }

    const line = ExecutionLogFormatter.stageLine(
      target.execution.indentLevel,
      target.workflowName,
      target.stageName,
      `message: ${message}`,
    );
    const logger = LoggerManager.getLogger();
    if (level === LogLevel.ERROR) {
      logger.error(line, undefined, undefined, LogCategory.RUNTIME);
    } else {
      logger.info(line, undefined, LogCategory.RUNTIME);
    }

    await this.events.emit(
      createEvent(
        EngineEventType.STAGE_MESSAGE,
        { message },
        { workflowName: target.workflowName, stageName: target.stageName, depth: target.execution.indentLevel },
      ),
    );
    return message;
  }
}
