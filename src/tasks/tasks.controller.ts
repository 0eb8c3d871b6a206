import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Query,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common'
import { CompleteTaskDto } from './dto/complete-task.dto'
import { ListTasksQueryDto } from './dto/list-tasks.query.dto'
import { UpdateTaskNoteDto } from './dto/update-task-note.dto'
import { TasksService } from './tasks.service'

@Controller('tasks')
export class TasksController {
  constructor(private readonly tasksService: TasksService) {}

  @Get()
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, transform: true }))
  list(@Query() query: ListTasksQueryDto) {
    return this.tasksService.listTasks(query)
  }

  @Get(':id')
  get(@Param('id', ParseIntPipe) id: number) {
    return this.tasksService.getTask(id)
  }

  @Post(':id/complete')
  @HttpCode(200)
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
  complete(@Param('id', ParseIntPipe) id: number, @Body() body: CompleteTaskDto) {
    const { calories, avgHr, distanceKm } = body
    return this.tasksService.completeTaskManually(id, {
      actualDurationMin: body.actualDurationMin,
      actualEffort: { calories, avgHr, distanceKm },
      linkedActivityId: body.linkedActivityId,
      note: body.note,
    })
  }

  @Patch(':id/note')
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
  updateNote(@Param('id', ParseIntPipe) id: number, @Body() body: UpdateTaskNoteDto) {
    return this.tasksService.updateTaskNote(id, body.note ?? null)
  }
}
