import { describe, test, expect } from "vitest";
import { ProcessRunner, type ProcessFinished } from "./runner";
import { buildCommand } from "#/command";
import { createMockProcessLauncher } from "#/test-utils/mocks";

function webBuild() {
  return buildCommand({
    toolPath: "stack",
    operation: "build",
    args: ["web:lib"],
    workingDirectory: "/work/web",
    packageName: "web",
  });
}

describe("ProcessRunner", () => {
  test("launches the command line in the working directory", () => {
    const launcher = createMockProcessLauncher();
    const runner = new ProcessRunner(launcher);

    runner.run(webBuild());

    expect(launcher.processes).toHaveLength(1);
    expect(launcher.processes[0]?.request.commandLine).toBe("stack build web:lib");
    expect(launcher.processes[0]?.request.cwd).toBe("/work/web");
  });

  test("collects output into the command's channel", () => {
    const launcher = createMockProcessLauncher();
    const runner = new ProcessRunner(launcher);

    runner.run(webBuild());
    launcher.processes[0]?.emit("Building library\n");
    launcher.processes[0]?.emit("Done\n");

    expect(runner.output("web.stack-log")).toBe("Building library\nDone\n");
    expect(runner.output("other.stack-log")).toBe("");
  });

  test("clears the channel when a new command starts on it", () => {
    const launcher = createMockProcessLauncher();
    const runner = new ProcessRunner(launcher);

    runner.run(webBuild());
    launcher.processes[0]?.emit("old\n");
    runner.run(webBuild());

    expect(runner.output("web.stack-log")).toBe("");
  });

  test("notifies finish listeners with outcome and output", () => {
    const launcher = createMockProcessLauncher();
    const runner = new ProcessRunner(launcher);
    const events: ProcessFinished[] = [];
    runner.onFinish((event) => events.push(event));

    const command = webBuild();
    runner.run(command);
    launcher.processes[0]?.emit("ok\n");
    launcher.processes[0]?.exit(1);

    expect(events).toEqual([
      {
        command,
        channel: "web.stack-log",
        outcome: { status: "exited", exitCode: 1, signal: null },
        output: "ok\n",
      },
    ]);
  });

  test("reports spawn failures as failed-to-start", () => {
    const launcher = createMockProcessLauncher();
    const runner = new ProcessRunner(launcher);
    const events: ProcessFinished[] = [];
    runner.onFinish((event) => events.push(event));

    runner.run(webBuild());
    const error = new Error("spawn /bin/sh ENOENT");
    launcher.processes[0]?.failToStart(error);

    expect(events[0]?.outcome).toEqual({ status: "failed-to-start", error });
  });

  test("removed listeners are not called", () => {
    const launcher = createMockProcessLauncher();
    const runner = new ProcessRunner(launcher);
    let calls = 0;
    const off = runner.onFinish(() => calls++);

    off();
    runner.run(webBuild());
    launcher.processes[0]?.exit();

    expect(calls).toBe(0);
  });
});
