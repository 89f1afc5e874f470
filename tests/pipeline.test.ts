import { createAgentRoster } from "../src/core/agents/definitions.js";
import { InMemoryJobStore } from "../src/infrastructure/store/InMemoryJobStore.js";
import { TaskScheduler } from "../src/infrastructure/queue/TaskScheduler.js";
import { MeetingPipeline, summarySubject } from "../src/application/services/MeetingPipeline.js";
import { JobService } from "../src/application/services/JobService.js";
import { FakeAgentRunner, deferred } from "./helpers/FakeAgentRunner.js";

const TRANSCRIPT = "Alice: Hi. Bob: Let's ship Friday.";

describe("MeetingPipeline", () => {
  let store: InMemoryJobStore;
  const agents = createAgentRoster("test-model");

  beforeEach(() => {
    store = new InMemoryJobStore();
    store.create("job-1");
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test("should run the three stages in order and complete the job", async () => {
    const runner = new FakeAgentRunner();
    const pipeline = new MeetingPipeline(runner, store, agents, ["team@example.com"]);

    await pipeline.run("job-1", TRANSCRIPT);

    expect(runner.calls.map((c) => c.agent)).toEqual(["Transcriber", "Clarifier", "Summarizer"]);
    expect(runner.calls[0].input).toBe(TRANSCRIPT);
    expect(runner.calls[1].input).toBe(`Transcriber: ${TRANSCRIPT}`);
    expect(runner.calls[2].input).toBe(`Clarifier: Transcriber: ${TRANSCRIPT}`);
    expect(store.get("job-1")).toEqual({ status: "completed" });
  });

  test("should give the summarizer recipients and a subject derived from the job id", async () => {
    const runner = new FakeAgentRunner();
    const pipeline = new MeetingPipeline(runner, store, agents, ["team@example.com"]);

    await pipeline.run("job-1", TRANSCRIPT);

    expect(runner.calls[0].context).toBeUndefined();
    expect(runner.calls[1].context).toBeUndefined();
    expect(runner.calls[2].context).toEqual({
      recipients: ["team@example.com"],
      subject: "Summary #job-1",
    });
    expect(summarySubject("abc")).toBe("Summary #abc");
  });

  test("should fall back to the clean text when the clarifier returns an empty string", async () => {
    const runner = new FakeAgentRunner({
      Transcriber: () => "clean text",
      Clarifier: () => "",
    });
    const pipeline = new MeetingPipeline(runner, store, agents, ["team@example.com"]);

    await pipeline.run("job-1", TRANSCRIPT);

    expect(runner.callsFor("Summarizer")[0].input).toBe("clean text");
    expect(store.get("job-1")).toEqual({ status: "completed" });
  });

  test("should fall back to the clean text when the clarifier returns no output", async () => {
    const runner = new FakeAgentRunner({
      Transcriber: () => "clean text",
      Clarifier: () => null,
    });
    const pipeline = new MeetingPipeline(runner, store, agents, ["team@example.com"]);

    await pipeline.run("job-1", TRANSCRIPT);

    expect(runner.callsFor("Summarizer")[0].input).toBe("clean text");
  });

  test("should stop after a failing transcriber", async () => {
    const runner = new FakeAgentRunner({
      Transcriber: () => {
        throw new Error("model unavailable");
      },
    });
    const pipeline = new MeetingPipeline(runner, store, agents, ["team@example.com"]);

    await pipeline.run("job-1", TRANSCRIPT);

    expect(runner.callsFor("Transcriber")).toHaveLength(1);
    expect(runner.callsFor("Clarifier")).toHaveLength(0);
    expect(runner.callsFor("Summarizer")).toHaveLength(0);
    expect(store.get("job-1")).toEqual({ status: "failed", error: "model unavailable" });
  });

  test("should stop after a failing clarifier", async () => {
    const runner = new FakeAgentRunner({
      Clarifier: async () => {
        throw new Error("rate limited");
      },
    });
    const pipeline = new MeetingPipeline(runner, store, agents, ["team@example.com"]);

    await pipeline.run("job-1", TRANSCRIPT);

    expect(runner.callsFor("Summarizer")).toHaveLength(0);
    expect(store.get("job-1")).toEqual({ status: "failed", error: "rate limited" });
  });

  test("should fail the job when the summarizer fails", async () => {
    const runner = new FakeAgentRunner({
      Summarizer: () => {
        throw new Error("tool failed");
      },
    });
    const pipeline = new MeetingPipeline(runner, store, agents, ["team@example.com"]);

    await pipeline.run("job-1", TRANSCRIPT);

    expect(runner.calls).toHaveLength(3);
    expect(store.get("job-1")).toEqual({ status: "failed", error: "tool failed" });
  });

  test("should hand an empty transcriber output to the clarifier", async () => {
    const runner = new FakeAgentRunner({ Transcriber: () => "" });
    const pipeline = new MeetingPipeline(runner, store, agents, ["team@example.com"]);

    await pipeline.run("job-1", "");

    expect(runner.calls.map((c) => c.agent)).toEqual(["Transcriber", "Clarifier", "Summarizer"]);
    expect(runner.callsFor("Clarifier")[0].input).toBe("");
    expect(store.get("job-1")).toEqual({ status: "completed" });
  });

  test("should treat a missing transcriber output as empty text", async () => {
    const runner = new FakeAgentRunner({ Transcriber: () => null, Clarifier: () => null });
    const pipeline = new MeetingPipeline(runner, store, agents, ["team@example.com"]);

    await pipeline.run("job-1", TRANSCRIPT);

    expect(runner.callsFor("Clarifier")[0].input).toBe("");
    expect(runner.callsFor("Summarizer")[0].input).toBe("");
    expect(store.get("job-1")).toEqual({ status: "completed" });
  });

  test("should record a non-empty error for errors without a message", async () => {
    const runner = new FakeAgentRunner({
      Transcriber: () => {
        throw new Error("");
      },
    });
    const pipeline = new MeetingPipeline(runner, store, agents, ["team@example.com"]);

    await pipeline.run("job-1", TRANSCRIPT);

    expect(store.get("job-1")).toEqual({ status: "failed", error: "Error" });
  });
});

describe("JobService", () => {
  let store: InMemoryJobStore;
  let scheduler: TaskScheduler;

  beforeEach(() => {
    store = new InMemoryJobStore();
    scheduler = new TaskScheduler();
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function createService(runner: FakeAgentRunner, ids?: () => string): JobService {
    const pipeline = new MeetingPipeline(runner, store, createAgentRoster("test-model"), ["team@example.com"]);
    return new JobService(store, scheduler, pipeline, ids);
  }

  test("should return an id whose job is immediately visible as started", async () => {
    const gate = deferred<string>();
    const runner = new FakeAgentRunner({ Transcriber: () => gate.promise });
    const service = createService(runner);

    const jobId = service.submitJob(TRANSCRIPT);

    expect(service.getJobStatus(jobId)).toEqual({ status: "started" });
    expect(runner.calls).toHaveLength(0);

    gate.resolve("clean");
    await scheduler.drain();
    expect(service.getJobStatus(jobId)).toEqual({ status: "completed" });
  });

  test("should use the injected id generator", async () => {
    const service = createService(new FakeAgentRunner(), () => "fixed-id");

    expect(service.submitJob(TRANSCRIPT)).toBe("fixed-id");
    await scheduler.drain();
  });

  test("should return null for unknown jobs", () => {
    const service = createService(new FakeAgentRunner());
    expect(service.getJobStatus("missing")).toBeNull();
  });

  test("should keep concurrent jobs independent", async () => {
    const runner = new FakeAgentRunner({
      Transcriber: async (input) => {
        if (input.includes("fail")) {
          throw new Error(`cannot transcribe ${input}`);
        }
        return input;
      },
    });
    const service = createService(runner);
    const transcripts = ["one", "fail-two", "three", "fail-four", "five"];

    const ids = transcripts.map((t) => service.submitJob(t));
    await scheduler.drain();

    expect(new Set(ids).size).toBe(transcripts.length);
    expect(ids.map((id) => service.getJobStatus(id))).toEqual([
      { status: "completed" },
      { status: "failed", error: "cannot transcribe fail-two" },
      { status: "completed" },
      { status: "failed", error: "cannot transcribe fail-four" },
      { status: "completed" },
    ]);
    expect(service.getStatistics()).toEqual({ total: 5, started: 0, completed: 3, failed: 2 });
  });
});
