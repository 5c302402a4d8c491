// src/adapters/graphql/report/dto/report.result.ts
import { Field, Float, Int, ObjectType } from '@nestjs/graphql';
import GraphQLJSON from 'graphql-type-json';
import { GqlPageLinkKind, GqlSortDirection } from '../report.enums';

@ObjectType({ description: '链接参数（由前端编码为查询字符串）' })
export class LinkParamDTO {
  @Field(() => String)
  key!: string;

  @Field(() => String)
  value!: string;
}

@ObjectType({ description: '报表列' })
export class ReportColumnDTO {
  @Field(() => String, { description: '排序键' })
  key!: string;

  @Field(() => String, { description: '展示名称' })
  label!: string;

  @Field(() => String, { description: '结果行中的字段名' })
  field!: string;

  @Field(() => Boolean, { description: '是否可排序' })
  sortable!: boolean;
}

@ObjectType({ description: '当前排序状态' })
export class SortStateDTO {
  @Field(() => String, { description: '当前排序列 key' })
  activeKey!: string;

  @Field(() => GqlSortDirection, { description: '排序方向' })
  direction!: GqlSortDirection;
}

@ObjectType({ description: '结果窗口' })
export class ResultWindowDTO {
  @Field(() => Float, { description: '结果总数' })
  totalCount!: number;

  @Field(() => Float, { description: '总页数（无结果时为 0）' })
  pageCount!: number;

  // 无结果时保留请求页码，可能超出 32 位整数范围
  @Field(() => Float, { description: '当前页码' })
  currentIndex!: number;

  @Field(() => Boolean, { description: '当前页码是否有效' })
  isValid!: boolean;
}

@ObjectType({ description: '页码链接' })
export class PageLinkDTO {
  @Field(() => GqlPageLinkKind)
  kind!: GqlPageLinkKind;

  @Field(() => String)
  label!: string;

  @Field(() => Float, { description: '目标页码' })
  targetIndex!: number;

  @Field(() => Boolean, { description: '是否为当前页' })
  current!: boolean;

  @Field(() => [LinkParamDTO])
  params!: LinkParamDTO[];
}

@ObjectType({ description: '页码列表' })
export class PageListDTO {
  @Field(() => [PageLinkDTO])
  pageLinks!: PageLinkDTO[];

  @Field(() => Boolean)
  hasPrev!: boolean;

  @Field(() => Boolean)
  hasNext!: boolean;

  @Field(() => Float, { nullable: true })
  firstIndex!: number | null;

  @Field(() => Float, { nullable: true })
  lastIndex!: number | null;
}

@ObjectType({ description: '表头条目' })
export class SortHeaderDTO {
  @Field(() => String)
  key!: string;

  @Field(() => String)
  label!: string;

  @Field(() => Boolean)
  sortable!: boolean;

  @Field(() => Boolean, { description: '是否为当前排序列' })
  active!: boolean;

  @Field(() => GqlSortDirection, { description: '当前排序方向（仅当前排序列）', nullable: true })
  direction!: GqlSortDirection | null;

  @Field(() => [LinkParamDTO], { description: '点击表头的链接参数（不可排序列为空）', nullable: true })
  params!: LinkParamDTO[] | null;
}

@ObjectType({ description: '报表分页结果' })
export class ReportPageResult {
  @Field(() => String)
  name!: string;

  @Field(() => [String], { description: '结果字段名（与列顺序一致）' })
  fields!: string[];

  @Field(() => [GraphQLJSON], { description: '当前页数据行' })
  rows!: Record<string, unknown>[];

  @Field(() => SortStateDTO)
  sort!: SortStateDTO;

  @Field(() => ResultWindowDTO)
  window!: ResultWindowDTO;

  @Field(() => PageListDTO)
  pageList!: PageListDTO;

  @Field(() => [SortHeaderDTO])
  sortHeaders!: SortHeaderDTO[];

  @Field(() => Int, { description: '实际查询次数' })
  attempts!: number;
}

@ObjectType({ description: '已注册的报表' })
export class ReportSummaryDTO {
  @Field(() => String)
  name!: string;

  @Field(() => [ReportColumnDTO])
  columns!: ReportColumnDTO[];

  @Field(() => String, { description: '默认排序列' })
  defaultSort!: string;

  @Field(() => Int)
  pageSize!: number;

  @Field(() => Int)
  windowSize!: number;
}
