import { Module } from "@nestjs/common";
import { ConfigModule } from "./modules/config";
import { ElectionModule } from "./modules/election";

@Module({
  imports: [ConfigModule, ElectionModule],
})
export class AppModule {}
