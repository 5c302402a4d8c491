// src/adapters/graphql/report/dto/report.input.ts
import { Field, InputType } from '@nestjs/graphql';
import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  IsArray,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  ValidateNested,
} from 'class-validator';

/**
 * 透传参数：翻页与排序链接中需要保留的其他请求参数
 */
@InputType({ description: '透传请求参数' })
export class ReportParamInput {
  @Field(() => String, { description: '参数名' })
  @IsString({ message: '参数名必须是字符串' })
  @IsNotEmpty({ message: '参数名不能为空' })
  @MaxLength(64, { message: '参数名长度不能超过 64 个字符' })
  key!: string;

  @Field(() => String, { description: '参数值' })
  @IsString({ message: '参数值必须是字符串' })
  @MaxLength(512, { message: '参数值长度不能超过 512 个字符' })
  value!: string;
}

/**
 * 报表查询输入参数
 * page / sort / direction 均为原始字符串，非法值在用例层静默回退到默认值
 */
@InputType({ description: '报表查询输入参数' })
export class ReportInput {
  @Field(() => String, { description: '报表名称' })
  @IsString({ message: '报表名称必须是字符串' })
  @IsNotEmpty({ message: '报表名称不能为空' })
  @MaxLength(64, { message: '报表名称长度不能超过 64 个字符' })
  name!: string;

  @Field(() => String, { description: '页码（从 1 开始）', nullable: true })
  @IsOptional()
  @IsString({ message: '页码必须是字符串' })
  @MaxLength(32, { message: '页码长度不能超过 32 个字符' })
  page?: string | null;

  @Field(() => String, { description: '排序列 key', nullable: true })
  @IsOptional()
  @IsString({ message: '排序列必须是字符串' })
  @MaxLength(64, { message: '排序列长度不能超过 64 个字符' })
  sort?: string | null;

  @Field(() => String, { description: '排序方向（asc / desc，大小写不敏感）', nullable: true })
  @IsOptional()
  @IsString({ message: '排序方向必须是字符串' })
  @MaxLength(8, { message: '排序方向长度不能超过 8 个字符' })
  direction?: string | null;

  @Field(() => [ReportParamInput], { description: '透传参数', nullable: true })
  @IsOptional()
  @IsArray({ message: '透传参数必须是数组' })
  @ArrayMaxSize(32, { message: '透传参数不能超过 32 个' })
  @ValidateNested({ each: true })
  @Type(() => ReportParamInput)
  params?: ReportParamInput[] | null;
}
