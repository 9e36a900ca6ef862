import {
  AuthorizationCodeStrategy,
  ClientCredentialsStrategy,
  SPOTIFY_SCOPES,
  buildAuthorizationUrl,
  clientCredentialsFlow,
  createAuthStrategy,
  authorizeCodeFlow,
} from "../src/services/spotifyAuthService";
import { AuthError } from "../src/utils/errors";
import {
  createFakeAuthGateway,
  createRecordingReporter,
  createScriptedPrompter,
  createTestConfig,
  ok,
  spotifyError,
} from "./helpers/fakes";

describe("spotifyAuthService", () => {
  const config = createTestConfig().spotify;

  test("buildAuthorizationUrl targets the authorize endpoint with playlist-modify scopes", () => {
    const url = new URL(buildAuthorizationUrl("test-client", "http://localhost:8888/callback"));

    expect(url.hostname).toBe("accounts.spotify.com");
    expect(url.pathname).toBe("/authorize");
    expect(url.searchParams.get("client_id")).toBe("test-client");
    expect(url.searchParams.get("response_type")).toBe("code");
    expect(url.searchParams.get("redirect_uri")).toBe("http://localhost:8888/callback");
    const scope = url.searchParams.get("scope") ?? "";
    for (const s of SPOTIFY_SCOPES) {
      expect(scope).toContain(s);
    }
  });

  test("authorizeCodeFlow exchanges the code for an access token", async () => {
    const api = createFakeAuthGateway("user-token");

    await expect(authorizeCodeFlow(api, "the-code")).resolves.toBe("user-token");
    expect(api.authorizationCodeGrant).toHaveBeenCalledWith("the-code");
  });

  test("clientCredentialsFlow uses the client credentials grant", async () => {
    const api = createFakeAuthGateway("app-token");

    await expect(clientCredentialsFlow(api)).resolves.toBe("app-token");
    expect(api.clientCredentialsGrant).toHaveBeenCalledTimes(1);
    expect(api.authorizationCodeGrant).not.toHaveBeenCalled();
  });

  test("a rejected exchange becomes AuthError", async () => {
    const api = createFakeAuthGateway();
    api.clientCredentialsGrant.mockRejectedValue(spotifyError(400));

    const err = await clientCredentialsFlow(api).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AuthError);
    expect((err as Error).message).toBe("Spotify token exchange failed: Spotify responded 400");
  });

  test("a body without access_token becomes AuthError", async () => {
    const api = createFakeAuthGateway();
    api.authorizationCodeGrant.mockResolvedValue(ok({ token_type: "Bearer" }));

    await expect(authorizeCodeFlow(api, "code")).rejects.toThrow(
      "Spotify token response could not be decoded: access_token: Required"
    );
  });

  describe("AuthorizationCodeStrategy", () => {
    test("prints the authorization url and reads the code from the operator", async () => {
      const api = createFakeAuthGateway();
      const prompter = createScriptedPrompter(["  code-from-browser \n"]);
      const reporter = createRecordingReporter();
      const strategy = new AuthorizationCodeStrategy(api, config, prompter, reporter);

      await expect(strategy.obtainAccessToken()).resolves.toBe("test-token");
      expect(reporter.infos).toHaveLength(1);
      expect(reporter.infos[0]).toMatch(
        /^Go to this URL to authorize: https:\/\/accounts\.spotify\.com(:443)?\/authorize\?/
      );
      expect(prompter.questions).toEqual(["Enter the authorization code:"]);
      expect(api.authorizationCodeGrant).toHaveBeenCalledWith("code-from-browser");
    });

    test("uses a preset code without prompting", async () => {
      const api = createFakeAuthGateway();
      const prompter = createScriptedPrompter([]);
      const reporter = createRecordingReporter();
      const strategy = new AuthorizationCodeStrategy(api, config, prompter, reporter, "preset");

      await strategy.obtainAccessToken();
      expect(prompter.questions).toEqual([]);
      expect(reporter.infos).toEqual([]);
      expect(api.authorizationCodeGrant).toHaveBeenCalledWith("preset");
    });
  });

  test("createAuthStrategy picks the strategy from the configured flow", () => {
    const api = createFakeAuthGateway();
    const prompter = createScriptedPrompter([]);
    const reporter = createRecordingReporter();

    expect(createAuthStrategy(config, api, prompter, reporter)).toBeInstanceOf(
      AuthorizationCodeStrategy
    );
    expect(
      createAuthStrategy({ ...config, authFlow: "client_credentials" }, api, prompter, reporter)
    ).toBeInstanceOf(ClientCredentialsStrategy);
  });
});
