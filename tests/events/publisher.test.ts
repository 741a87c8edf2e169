import { PipelineEvent } from '../../src/domain/events';
import { EVENT_SCHEMA_VERSION, EventPublisher } from '../../src/events/publisher';
import { MemoryEventStore } from '../../src/storage/memory-store';

describe('EventPublisher', () => {
  it('records events with a schema version', async () => {
    const publisher = new EventPublisher(new MemoryEventStore());
    const event = await publisher.publish('run_1', 'job.started', { jobId: 'job_1', variant: 'play-standard' });

    expect(event).toMatchObject({ type: 'job.started', schemaVersion: EVENT_SCHEMA_VERSION, runId: 'run_1', variant: 'play-standard', payload: {} });
    expect(event.id).toMatch(/^evt_/);
    expect(await publisher.getEventsByRun('run_1')).toEqual([event]);
  });

  it('delivers to matching subscribers until they unsubscribe', async () => {
    const publisher = new EventPublisher(new MemoryEventStore());
    const seen: string[] = [];
    const unsubscribe = publisher.subscribe({
      runId: 'run_1',
      eventTypes: ['job.failed'],
      callback: (event: PipelineEvent) => seen.push(`${event.runId}:${event.type}`),
    });

    await publisher.publish('run_1', 'job.started');
    await publisher.publish('run_2', 'job.failed');
    await publisher.publish('run_1', 'job.failed');
    unsubscribe();
    await publisher.publish('run_1', 'job.failed');

    expect(seen).toEqual(['run_1:job.failed']);
  });

  it('keeps delivering when a subscriber throws', async () => {
    const publisher = new EventPublisher(new MemoryEventStore());
    const seen: string[] = [];
    publisher.subscribe({
      callback: () => {
        throw new Error('subscriber failed');
      },
    });
    publisher.subscribe({ callback: (event) => seen.push(event.type) });

    await expect(publisher.publish('run_1', 'run.started')).resolves.toMatchObject({ type: 'run.started' });
    expect(seen).toEqual(['run.started']);
  });
});
