import "reflect-metadata";

export { AppModule } from "./app.module";
export * from "./modules/config";
export * from "./modules/election";
