import { MethodRegistry } from "../server/methodRegistry";
import { callToolHandler } from "./callTool";
import { initializeHandler, initializedHandler } from "./initialize";
import {
  listPromptsHandler,
  listResourcesHandler,
  listToolsHandler,
  pingHandler,
} from "./list_handlers";
import { cancelRequestHandler } from "./notifications";

/**
 * Builds the method table served over stdio.
 */
export function createMethodRegistry(): MethodRegistry {
  return new MethodRegistry()
    .onRequest("initialize", initializeHandler)
    .onRequest("ping", pingHandler)
    .onRequest("tools/list", listToolsHandler)
    .onRequest("resources/list", listResourcesHandler)
    .onRequest("prompts/list", listPromptsHandler)
    .onRequest("tools/call", callToolHandler)
    .onNotification("initialized", initializedHandler)
    .onNotification("notifications/initialized", initializedHandler)
    .onNotification("$/cancelRequest", cancelRequestHandler)
    .onNotification("notifications/cancelled", cancelRequestHandler);
}
