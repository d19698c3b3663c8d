export * from "./room-placement";
