import { IsNotEmpty, IsString } from "class-validator";

export class BatchRequestDto {
  @IsString()
  @IsNotEmpty({ message: "directory must not be empty" })
  directory!: string;
}
