import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { ElectionService } from "./election.service";

@Module({
  imports: [ConfigModule],
  providers: [ElectionService],
  exports: [ElectionService],
})
export class ElectionModule {}
