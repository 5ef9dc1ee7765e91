import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { OutputError } from "../src/core/errors";
import { CsvSink, LocalJsonlSink, createSink, escapeCsvField, toCsv, toOutputRow } from "../src/sink";
import { ScoredCandidate } from "../src/types";

function candidate(overrides: Partial<ScoredCandidate> = {}): ScoredCandidate {
  return {
    person: {
      name: "Jane Doe",
      title: "CTO, Co-founder",
      linkedinUrl: "https://li.com/jane/",
      source: "team_page",
      sourceUrl: "https://acme.test/team",
      sourceUrls: ["https://news.test/a1", "https://acme.test/team"],
    },
    companyName: "Acme",
    vetting: {
      roleCategory: "Engineering",
      seniorityLevel: "C-level",
      location: "Remote",
      industryExperience: ["developer tools", "devops"],
      matchesCriteria: true,
      reasoning: "Technical founder",
    },
    fitScore: 2.3,
    fitReasons: "Role match: Engineering",
    responseScore: 0.5,
    responseReasons: 'C-level (typically busy); "in the news"',
    totalScore: 2.8,
    sourceArticleUrl: "https://news.test/a1",
    discoveredAt: "2024-05-01T12:30:00.000Z",
    ...overrides,
  };
}

describe("escapeCsvField", () => {
  it("quotes only when needed", () => {
    expect(escapeCsvField("plain")).toBe("plain");
    expect(escapeCsvField("a,b")).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField("two\nlines")).toBe('"two\nlines"');
  });
});

describe("toOutputRow", () => {
  it("formats scores and lists profile urls without the article", () => {
    const row = toOutputRow(candidate());

    expect(row.fit_score).toBe("2.30");
    expect(row.total_score).toBe("2.80");
    expect(row.source_profile_urls).toBe("https://li.com/jane/, https://acme.test/team");
    expect(row.industries).toBe("developer tools, devops");
    expect(row.school).toBe("");
    expect(row.discovered_date).toBe("2024-05-01");
  });
});

describe("toCsv", () => {
  it("writes the header and one escaped line per candidate", () => {
    const lines = toCsv([candidate()]).split("\r\n");

    expect(lines[0]).toBe(
      "name,title,company,fit_score,response_score,total_score,fit_reasons,response_reasons,source_article_url," +
        "source_profile_urls,linkedin_url,email,school,role,seniority,location,industries,discovered_date",
    );
    expect(lines[1]).toBe(
      'Jane Doe,"CTO, Co-founder",Acme,2.30,0.50,2.80,Role match: Engineering,' +
        '"C-level (typically busy); ""in the news""",https://news.test/a1,' +
        '"https://li.com/jane/, https://acme.test/team",https://li.com/jane/,,,Engineering,C-level,Remote,' +
        '"developer tools, devops",2024-05-01',
    );
    expect(lines[2]).toBe("");
    expect(lines).toHaveLength(3);
  });
});

describe("file sinks", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "scout-sink-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("replaces the CSV file on every write", async () => {
    const outputPath = path.join(dir, "nested", "out.csv");
    const sink = new CsvSink(outputPath);

    await sink.write([candidate(), candidate({ person: { ...candidate().person, name: "Omar Haddad" } })]);
    await sink.write([candidate()]);

    const content = fs.readFileSync(outputPath, "utf-8");
    expect(content.split("\r\n")).toHaveLength(3);
    expect(fs.existsSync(`${outputPath}.part`)).toBe(false);
  });

  it("appends ranked JSON lines tagged with the run", async () => {
    const outputPath = path.join(dir, "out.jsonl");
    const sink = createSink({ outputFormat: "jsonl", outputPath }, "run-1");

    await sink.write([candidate(), candidate({ companyName: "Globex" })]);
    await new LocalJsonlSink(outputPath, "run-2").write([candidate()]);

    const lines = fs.readFileSync(outputPath, "utf-8").trimEnd().split("\n").map((line) => JSON.parse(line));
    expect(lines.map((line) => [line.runId, line.rank, line.company])).toEqual([
      ["run-1", 1, "Acme"],
      ["run-1", 2, "Globex"],
      ["run-2", 1, "Acme"],
    ]);
  });

  it("reports write problems as OutputError", async () => {
    const blocker = path.join(dir, "blocker");
    fs.writeFileSync(blocker, "");
    const sink = new CsvSink(path.join(blocker, "out.csv"));

    await expect(sink.write([candidate()])).rejects.toBeInstanceOf(OutputError);
  });
});
