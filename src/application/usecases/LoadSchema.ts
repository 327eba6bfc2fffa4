import { Schema } from '../../domain/model/Schema.js';
import { SchemaConverter } from '../../domain/services/SchemaConverter.js';
import type { RunContext } from '../RunContext.js';

/** Use case: build the run's Schema from its dictionary source, once. */
export class LoadSchema {
  constructor(private readonly ctx: RunContext) {}

  async execute(): Promise<Schema> {
    if (this.ctx.schema) return this.ctx.schema;

    const { schemaSource, asteriskMarksRequired } = this.ctx.settings;
    const schema =
      schemaSource instanceof Schema
        ? schemaSource
        : new SchemaConverter({ asteriskMarksRequired }).convertDictionary(await schemaSource.load());

    this.ctx.schema = schema;
    this.ctx.eventBus.emit({
      type: 'schema:loaded',
      runId: this.ctx.runId,
      ...(schema.metadata.identifier !== undefined ? { identifier: schema.metadata.identifier } : {}),
      ...(schema.metadata.title !== undefined ? { title: schema.metadata.title } : {}),
      fieldCount: schema.size,
      timestamp: Date.now(),
    });

    return schema;
  }
}
