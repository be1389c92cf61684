import { AdminLoginRequest } from "@orderdesk/types";
import { IsEmail, IsNotEmpty, IsString } from "class-validator";

export class AdminLoginDto implements AdminLoginRequest {
  @IsEmail({}, { message: "email must be a valid email address" })
  email!: string;

  @IsString({ message: "password is required" })
  @IsNotEmpty({ message: "password is required" })
  password!: string;
}
