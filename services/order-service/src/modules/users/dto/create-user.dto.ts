import { CreateUserRequest } from "@orderdesk/types";
import { IsArray, IsOptional, IsString, MaxLength } from "class-validator";
import { IsFilled } from "../../../common/validators";

export class CreateUserDto implements CreateUserRequest {
  @IsFilled("userId and email required")
  userId!: string;

  @IsFilled("userId and email required")
  email!: string;

  @IsOptional()
  @IsString({ message: "displayName must be a string" })
  @MaxLength(120, { message: "displayName must be at most 120 characters" })
  displayName?: string;

  @IsOptional()
  @IsArray({ message: "phoneNumbers must be a list of strings" })
  @IsString({ each: true, message: "phoneNumbers must be a list of strings" })
  phoneNumbers?: string[];
}
