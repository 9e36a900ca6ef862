import { IncomingMessage, Server, ServerResponse, createServer } from "node:http";
import { LlmConfig } from "../src/config/env";
import { createLlmClient } from "../src/services/llmClient";
import { TransportError } from "../src/utils/errors";

interface ReceivedRequest {
  method?: string;
  url?: string;
  authorization?: string;
  contentType?: string;
  body: unknown;
}

function listen(server: Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("server is not listening on a TCP port"));
        return;
      }
      resolve(address.port);
    });
  });
}

function close(server: Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

describe("createLlmClient", () => {
  let server: Server;
  let baseUrl: string;
  const received: ReceivedRequest[] = [];

  const configFor = (path: string): LlmConfig => ({
    apiKey: "test-key",
    model: "test-model",
    apiUrl: `${baseUrl}${path}`,
  });

  beforeAll(async () => {
    server = createServer((req: IncomingMessage, res: ServerResponse) => {
      let raw = "";
      req.on("data", (piece: Buffer) => {
        raw += piece.toString("utf8");
      });
      req.on("end", () => {
        received.push({
          method: req.method,
          url: req.url,
          authorization: req.headers.authorization,
          contentType: req.headers["content-type"],
          body: raw ? JSON.parse(raw) : undefined,
        });

        if (req.url === "/fail") {
          res.writeHead(500, { "Content-Type": "application/json" });
          res.end(JSON.stringify({ error: "upstream exploded" }));
          return;
        }
        res.writeHead(200, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ choices: [{ message: { content: "hello" } }] }));
      });
    });
    const port = await listen(server);
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterAll(async () => {
    await close(server);
  });

  beforeEach(() => {
    received.length = 0;
  });

  test("posts the chat request as JSON with the bearer key", async () => {
    const llm = createLlmClient(configFor("/v1/chat/completions"));
    const request = {
      model: "test-model",
      messages: [{ role: "user" as const, content: "suggest songs" }],
    };

    const response = await llm.postChatCompletion(request);

    expect(llm.model).toBe("test-model");
    expect(response).toEqual({
      status: 200,
      data: { choices: [{ message: { content: "hello" } }] },
    });
    expect(received).toHaveLength(1);
    expect(received[0]).toEqual({
      method: "POST",
      url: "/v1/chat/completions",
      authorization: "Bearer test-key",
      contentType: "application/json",
      body: request,
    });
  });

  test("resolves with the status of a failed response instead of rejecting", async () => {
    const llm = createLlmClient(configFor("/fail"));

    const response = await llm.postChatCompletion({ model: "test-model", messages: [] });

    expect(response).toEqual({ status: 500, data: { error: "upstream exploded" } });
  });

  test("rejects with TransportError when nothing is listening", async () => {
    const idle = createServer();
    const port = await listen(idle);
    await close(idle);
    const llm = createLlmClient({
      apiKey: "test-key",
      model: "test-model",
      apiUrl: `http://127.0.0.1:${port}/v1/chat/completions`,
    });

    const err = await llm.postChatCompletion({ model: "test-model", messages: [] }).catch(
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ message: expect.stringMatching(/^LLM request failed: /) });
  });
});
