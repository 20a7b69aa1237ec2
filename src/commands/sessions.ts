import { Effect } from "effect";
import { SessionStoreService } from "../session-store.js";
import { coordinator, describeStatus, readBytes, writeBytes } from "./common.js";

export const importCommand = (path: string) =>
  Effect.gen(function* () {
    const sessions = yield* coordinator;
    const id = yield* sessions.importEnvelope(yield* readBytes(path));
    console.log(describeStatus(id, yield* sessions.status(id)));
    return id;
  });

export const exportCommand = (id: string, path: string) =>
  Effect.gen(function* () {
    const sessions = yield* coordinator;
    yield* writeBytes(path, yield* sessions.exportEnvelope(id));
    console.log(`Envelope for ${id} written to ${path}`);
  });

export const statusCommand = (id: string) =>
  Effect.gen(function* () {
    const sessions = yield* coordinator;
    const session = yield* sessions.session(id);
    console.log(describeStatus(id, yield* sessions.status(id)));
    if (session.request !== null) {
      console.log(`  action: ${session.request.kind}`);
    }
  });

export const listCommand = Effect.gen(function* () {
  const store = yield* SessionStoreService;
  const sessions = yield* coordinator;
  const ids = yield* store.list();
  if (ids.length === 0) {
    console.log("No signing sessions");
  }
  for (const id of ids) {
    console.log(describeStatus(id, yield* sessions.status(id)));
  }
});
