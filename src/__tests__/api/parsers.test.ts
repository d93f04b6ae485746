import { describe, expect, it } from "vitest";
import {
  mergeFileStates,
  mergeSocketDetails,
  mergeTimerDetails,
  parseJournalLine,
  parseJournalOutput,
  parseJsonAs,
  parseShowOutput,
  parseTimerSpecs,
  toUnit,
} from "../../api/parsers";
import { listUnitsSchema } from "../../api/schemas";
import { makeUnit } from "../test-utils";

describe("parseJournalLine", () => {
  it("copies the journal fields it knows", () => {
    const line = JSON.stringify({
      MESSAGE: "Started nginx",
      PRIORITY: "6",
      __REALTIME_TIMESTAMP: "1700000000000000",
      _PID: "812",
      SYSLOG_IDENTIFIER: "systemd",
      _BOOT_ID: "boot-1",
      _SYSTEMD_INVOCATION_ID: "inv-1",
      __CURSOR: "s=abc;i=1",
    });
    expect(parseJournalLine(line)).toEqual({
      message: "Started nginx",
      severity: 6,
      timestamp: 1700000000000000,
      pid: "812",
      identifier: "systemd",
      bootId: "boot-1",
      invocationId: "inv-1",
      cursor: "s=abc;i=1",
    });
  });

  it("decodes a message sent as bytes", () => {
    expect(parseJournalLine('{"MESSAGE":[104,105,33]}').message).toBe("hi!");
  });

  it("falls back to the raw line for any other message type", () => {
    const line = '{"MESSAGE":null,"PRIORITY":"x"}';
    const record = parseJournalLine(line);
    expect(record.message).toBe(line);
    expect(record.severity).toBeUndefined();
  });

  it("keeps text that is not a JSON object as the message", () => {
    expect(parseJournalLine("-- No entries --")).toEqual({ message: "-- No entries --" });
    expect(parseJournalLine("[1,2]")).toEqual({ message: "[1,2]" });
  });
});

describe("parseJournalOutput", () => {
  it("skips blank lines", () => {
    const out = '{"MESSAGE":"one"}\n\n{"MESSAGE":"two"}\n';
    expect(parseJournalOutput(out).map((r) => r.message)).toEqual(["one", "two"]);
  });
});

describe("parseTimerSpecs", () => {
  it("keeps the part of each group before the first semicolon", () => {
    const raw = "{ OnCalendar=daily ; next_elapse=Tue 2024-01-02 00:00:00 UTC } { OnCalendar=weekly ; next_elapse=n/a }";
    expect(parseTimerSpecs(raw)).toEqual(["OnCalendar=daily", "OnCalendar=weekly"]);
  });

  it("returns nothing for an empty value", () => {
    expect(parseTimerSpecs("")).toEqual([]);
  });
});

describe("parseShowOutput", () => {
  const out = [
    "Description=Web server=fast",
    "MainPID=812",
    "MemoryCurrent=[not set]",
    "CPUUsageNSec=123456789",
    "After=network.target  basic.target",
    "Wants=",
    "TimersCalendar={ OnCalendar=*-*-* 06:00:00 ; next_elapse=Tue 2024-01-02 06:00:00 UTC }",
  ].join("\n");

  it("splits each line on the first equals sign", () => {
    expect(parseShowOutput(out).description).toBe("Web server=fast");
  });

  it("reads counters only when they hold a number", () => {
    const props = parseShowOutput(out);
    expect(props.mainPid).toBe(812);
    expect(props.memoryCurrent).toBeUndefined();
    expect(props.cpuUsageNsec).toBe(123456789);
    expect(parseShowOutput("MemoryCurrent=infinity").memoryCurrent).toBeUndefined();
  });

  it("splits dependency lists on whitespace", () => {
    const props = parseShowOutput(out);
    expect(props.after).toEqual(["network.target", "basic.target"]);
    expect(props.wants).toEqual([]);
  });

  it("reduces timer groups to their specs", () => {
    expect(parseShowOutput(out).timersCalendar).toEqual(["OnCalendar=*-*-* 06:00:00"]);
  });

  it("defaults missing keys", () => {
    const props = parseShowOutput("");
    expect(props.mainPid).toBe(0);
    expect(props.fragmentPath).toBe("");
  });
});

describe("unit list parsing", () => {
  it("maps listed units", () => {
    const listed = parseJsonAs(
      '[{"unit":"nginx.service","load":"loaded","active":"active","sub":"running","description":"Web"}]',
      listUnitsSchema,
    );
    expect(listed?.map(toUnit)).toEqual([
      { name: "nginx.service", loadState: "loaded", activeState: "active", subState: "running", description: "Web" },
    ]);
  });

  it("rejects output that does not match the schema", () => {
    expect(parseJsonAs('[{"unit":"nginx.service"}]', listUnitsSchema)).toBeNull();
    expect(parseJsonAs("not json", listUnitsSchema)).toBeNull();
  });
});

describe("detail merges", () => {
  const nowUs = 1_000_000_000_000;

  it("describes the next timer elapse", () => {
    const merged = mergeTimerDetails(
      [makeUnit("backup.timer", "waiting"), makeUnit("fstrim.timer", "waiting"), makeUnit("other.timer")],
      [
        { unit: "backup.timer", next: nowUs + 90_000_000 },
        { unit: "fstrim.timer", next: 0 },
      ],
      nowUs,
    );
    expect(merged.map((u) => u.detail)).toEqual(["next: 1m 30s", "next: n/a", undefined]);
  });

  it("treats a missing next elapse as none scheduled", () => {
    const [unit] = mergeTimerDetails([makeUnit("a.timer")], [{ unit: "a.timer", next: null }], nowUs);
    expect(unit.detail).toBe("next: n/a");
  });

  it("shows socket listen addresses", () => {
    const [unit] = mergeSocketDetails([makeUnit("sshd.socket", "listening")], [{ unit: "sshd.socket", listen: "[::]:22 (Stream)" }]);
    expect(unit.detail).toBe("[::]:22 (Stream)");
  });

  it("matches unit files by file name", () => {
    const merged = mergeFileStates(
      [makeUnit("nginx.service"), makeUnit("cron.service")],
      [{ unit_file: "/usr/lib/systemd/system/nginx.service", state: "enabled" }],
    );
    expect(merged.map((u) => u.fileState)).toEqual(["enabled", undefined]);
  });
});
